import type { ChangeKind, FileChange, Hunk } from "../types.js";

const GIT_HEADER_PREFIX = "diff --git ";
const UNQUOTED_HEADER_PATHS = /^a\/(.+?) b\/(.+)$/;
const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DEV_NULL = "/dev/null";

interface FileBuilder {
  oldPath: string | null;
  newPath: string | null;
  kind: ChangeKind | null;
  hunks: Hunk[];
}

interface HunkBuilder {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  oldRemaining: number;
  newRemaining: number;
  lines: string[];
}

const C_ESCAPES: Record<string, number> = { a: 7, b: 8, t: 9, n: 10, v: 11, f: 12, r: 13, '"': 34, "\\": 92 };

/**
 * Undoes git's C-style path quoting (`"caf\303\251.txt"`): backslash escapes and octal bytes,
 * decoded as UTF-8. Unquoted input is returned unchanged.
 */
export function unquoteGitPath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;
  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  for (let index = 0; index < body.length; index += 1) {
    const char = body[index] ?? "";
    if (char !== "\\") {
      bytes.push(...Buffer.from(char, "utf8"));
      continue;
    }
    const octal = /^[0-7]{3}/.exec(body.slice(index + 1, index + 4));
    if (octal) {
      bytes.push(Number.parseInt(octal[0], 8));
      index += 3;
      continue;
    }
    const escaped = C_ESCAPES[body[index + 1] ?? ""];
    if (escaped === undefined) {
      bytes.push(92);
      continue;
    }
    bytes.push(escaped);
    index += 1;
  }
  return Buffer.from(bytes).toString("utf8");
}

/** Splits `a/x b/y`, where either side may be quoted. */
function readHeaderPaths(rest: string): [string, string] | null {
  if (!rest.includes('"')) {
    const match = UNQUOTED_HEADER_PATHS.exec(rest);
    return match?.[1] && match[2] ? [match[1], match[2]] : null;
  }

  const tokens: string[] = [];
  let index = 0;
  while (index < rest.length && tokens.length < 2) {
    if (rest[index] === " ") {
      index += 1;
      continue;
    }
    let end = index;
    if (rest[index] === '"') {
      end += 1;
      while (end < rest.length && rest[end] !== '"') end += rest[end] === "\\" ? 2 : 1;
      end += 1;
    } else {
      while (end < rest.length && rest[end] !== " ") end += 1;
    }
    tokens.push(unquoteGitPath(rest.slice(index, end)));
    index = end;
  }

  const [oldPath, newPath] = tokens;
  if (!oldPath?.startsWith("a/") || !newPath?.startsWith("b/")) return null;
  return [oldPath.slice(2), newPath.slice(2)];
}

function stripPathPrefix(raw: string): string | null {
  const field = raw.split("\t")[0]?.trim() ?? "";
  const path = unquoteGitPath(field);
  if (!path || path === DEV_NULL) return null;
  if (path.startsWith("a/") || path.startsWith("b/")) return path.slice(2);
  return path;
}

function closeHunk(hunk: HunkBuilder): Hunk {
  const useNewSide = hunk.newCount > 0;
  const startLine = useNewSide ? hunk.newStart : hunk.oldStart;
  const count = useNewSide ? hunk.newCount : Math.max(1, hunk.oldCount);
  return {
    startLine,
    endLine: startLine + count - 1,
    text: hunk.lines.join("\n")
  };
}

function toFileChange(builder: FileBuilder): FileChange | null {
  const path = builder.newPath ?? builder.oldPath;
  if (!path) return null;

  let kind: ChangeKind = builder.kind ?? "modified";
  if (builder.oldPath === null && builder.newPath !== null) kind = "added";
  if (builder.newPath === null && builder.oldPath !== null) kind = "deleted";
  if (kind === "modified" && builder.oldPath && builder.newPath && builder.oldPath !== builder.newPath) {
    kind = "renamed";
  }

  return {
    path,
    changeKind: kind,
    ...(kind === "renamed" && builder.oldPath ? { previousPath: builder.oldPath } : {}),
    hunks: builder.hunks
  };
}

/** Parses `git diff` / `diff -u` output into file changes, in the order they appear. */
export function parseUnifiedDiff(raw: string): FileChange[] {
  const files: FileChange[] = [];
  const lines = raw.replace(/\r\n/g, "\n").split("\n");
  let file: FileBuilder | null = null;
  let hunk: HunkBuilder | null = null;

  const flushHunk = (): void => {
    if (file && hunk) file.hunks.push(closeHunk(hunk));
    hunk = null;
  };
  const flushFile = (): void => {
    flushHunk();
    if (file) {
      const change = toFileChange(file);
      if (change) files.push(change);
    }
    file = null;
  };

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? "";

    if (hunk && (hunk.oldRemaining > 0 || hunk.newRemaining > 0)) {
      const marker = line[0];
      if (marker === " " || marker === "-" || marker === "+" || marker === "\\" || line === "") {
        hunk.lines.push(line);
        if (marker === " " || line === "") {
          hunk.oldRemaining -= 1;
          hunk.newRemaining -= 1;
        } else if (marker === "-") {
          hunk.oldRemaining -= 1;
        } else if (marker === "+") {
          hunk.newRemaining -= 1;
        }
        continue;
      }
    } else if (hunk && line.startsWith("\\")) {
      hunk.lines.push(line);
      continue;
    }

    const gitHeader = line.startsWith(GIT_HEADER_PREFIX) ? readHeaderPaths(line.slice(GIT_HEADER_PREFIX.length)) : null;
    if (gitHeader) {
      flushFile();
      file = { oldPath: gitHeader[0], newPath: gitHeader[1], kind: null, hunks: [] };
      continue;
    }

    if (line.startsWith("--- ") && (lines[index + 1] ?? "").startsWith("+++ ")) {
      if (!file || file.hunks.length > 0 || hunk) flushFile();
      const current: FileBuilder = file ?? { oldPath: null, newPath: null, kind: null, hunks: [] };
      current.oldPath = stripPathPrefix(line.slice(4));
      current.newPath = stripPathPrefix((lines[index + 1] ?? "").slice(4));
      file = current;
      index += 1;
      continue;
    }

    const hunkHeader = HUNK_HEADER.exec(line);
    if (hunkHeader && file) {
      flushHunk();
      const oldCount = hunkHeader[2] === undefined ? 1 : Number.parseInt(hunkHeader[2], 10);
      const newCount = hunkHeader[4] === undefined ? 1 : Number.parseInt(hunkHeader[4], 10);
      hunk = {
        oldStart: Number.parseInt(hunkHeader[1] ?? "0", 10),
        oldCount,
        newStart: Number.parseInt(hunkHeader[3] ?? "0", 10),
        newCount,
        oldRemaining: oldCount,
        newRemaining: newCount,
        lines: []
      };
      continue;
    }

    if (!file) continue;
    if (line.startsWith("new file mode")) {
      file.kind = "added";
      file.oldPath = null;
    } else if (line.startsWith("deleted file mode")) {
      file.kind = "deleted";
      file.newPath = null;
    } else if (line.startsWith("rename from ")) {
      file.kind = "renamed";
      file.oldPath = unquoteGitPath(line.slice("rename from ".length));
    } else if (line.startsWith("rename to ")) {
      file.kind = "renamed";
      file.newPath = unquoteGitPath(line.slice("rename to ".length));
    } else if (line.startsWith("copy to ")) {
      file.kind = "added";
      file.newPath = unquoteGitPath(line.slice("copy to ".length));
    }
  }

  flushFile();
  return files;
}
