import fs from "fs";
import os from "os";
import path from "path";

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "vqa-test-"));
}

/** Write `files` (relative path -> contents; non-strings are JSON-encoded) under `root`. */
export function writeTree(root: string, files: Record<string, unknown>) {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, typeof content === "string" ? content : JSON.stringify(content), "utf8");
  }
}
