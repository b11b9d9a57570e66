import fs, { type Dirent } from "fs";
import path from "path";
import { parse } from "lossless-json";
import type { LoadResult } from "./types";
import { NoMetadataFilesError } from "./errors";
import { lex } from "./utils";

const SKIP_DIRS = new Set(["node_modules"]);

const errorText = (err: unknown) => (err instanceof Error ? err.message : String(err));

const escapeRe = (s: string) => s.replace(/[.+^${}()|[\]\\]/g, "\\$&");

/**
 * Glob over "/"-separated relative paths: `**\/` spans directories, `*` and `?`
 * stay within one segment, `[abc]`, `[a-z]` and `[!abc]` match one character
 * of a segment. A `[` without a closing `]` is literal.
 */
export function globToRegExp(pattern: string): RegExp {
  let re = "";
  let i = 0;
  while (i < pattern.length) {
    const c = pattern[i];
    if (pattern.startsWith("**/", i)) {
      re += "(?:.*/)?";
      i += 3;
    } else if (pattern.startsWith("**", i)) {
      re += ".*";
      i += 2;
    } else if (c === "*") {
      re += "[^/]*";
      i++;
    } else if (c === "?") {
      re += "[^/]";
      i++;
    } else if (c === "[" && pattern.indexOf("]", i + 2) !== -1) {
      const end = pattern.indexOf("]", i + 2);
      let body = pattern.slice(i + 1, end);
      const negated = body.startsWith("!");
      if (negated) body = body.slice(1);
      const set = body.replace(/[\\\]^]/g, "\\$&");
      re += negated ? `[^/${set}]` : `(?!/)[${set}]`;
      i = end + 1;
    } else {
      re += escapeRe(c);
      i++;
    }
  }
  return new RegExp(`^${re}$`);
}

/**
 * Relative paths under `rootDir` matching `pattern`, sorted.
 * Symlinks are followed; a directory reached twice (by real path) is walked
 * once. Hidden entries and node_modules are not walked, and directories that
 * cannot be listed are reported and skipped.
 */
export function discoverMetadataFiles(rootDir: string, pattern: string): string[] {
  const matcher = globToRegExp(pattern);
  const found: string[] = [];
  const visited = new Set<string>();

  const walk = (rel: string) => {
    const dir = path.join(rootDir, rel);
    let entries: Dirent[];
    try {
      const real = fs.realpathSync(dir);
      if (visited.has(real)) return;
      visited.add(real);
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      console.warn(`Warning: failed to list ${rel || "."}: ${errorText(err)}`);
      return;
    }

    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const childRel = rel ? `${rel}/${entry.name}` : entry.name;
      let isDir = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        try {
          const target = fs.statSync(path.join(rootDir, childRel));
          isDir = target.isDirectory();
          isFile = target.isFile();
        } catch (err) {
          console.warn(`Warning: skipping link ${childRel}: ${errorText(err)}`);
          continue;
        }
      }
      if (isDir) {
        if (!SKIP_DIRS.has(entry.name)) walk(childRel);
      } else if (isFile && matcher.test(childRel)) {
        found.push(childRel);
      }
    }
  };

  walk("");
  return found.sort(lex);
}

/**
 * Concatenate the JSON arrays of every matching shard, in sorted file order.
 * Numbers are parsed losslessly so identity fields keep their source text.
 * Unreadable or unparsable files are reported and skipped; a non-array top
 * level contributes nothing.
 */
export function loadAllRecords(rootDir: string, pattern: string): LoadResult {
  const files = discoverMetadataFiles(rootDir, pattern);
  if (files.length === 0) throw new NoMetadataFilesError(pattern, rootDir);

  const records: unknown[] = [];
  const failedFiles: string[] = [];
  for (const file of files) {
    let data: unknown;
    try {
      data = parse(fs.readFileSync(path.join(rootDir, file), "utf8"));
    } catch (err) {
      console.warn(`Warning: failed to read ${file}: ${errorText(err)}`);
      failedFiles.push(file);
      continue;
    }
    if (!Array.isArray(data)) continue;
    for (const record of data) records.push(record);
  }

  return { records, files, failedFiles };
}
