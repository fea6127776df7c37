/**
 * Pure path utilities for the drive tree.
 * All functions are stateless.
 *
 * Paths are relative to the configured root: `"Folder1/File1"`. Leading,
 * trailing and repeated separators carry no meaning.
 */

const MAX_PATH_LENGTH = 4096;

export class PathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathError";
  }
}

/** Both slash styles separate segments. */
export function isPathSeparator(ch: string): boolean {
  return ch === "/" || ch === "\\";
}

/** Split a path into its non-empty segments: `/a//b/` → `["a", "b"]` */
export function splitPath(input: string): string[] {
  return input.split(/[/\\]/).filter((seg) => seg !== "");
}

/** Join segments with `/`, skipping empty ones: `("", "a", "b")` → `a/b` */
export function joinPath(...parts: string[]): string {
  return parts
    .flatMap((p) => splitPath(p))
    .join("/");
}

/** Join request segments the way stored names read: `["it's", "a"]` → `it-s/a` */
export function joinNames(parts: readonly string[]): string {
  return joinPath(...parts.map(sanitizeName));
}

/**
 * Replace characters a stored name cannot carry.
 * Separators would split the name; `'` quotes names in store queries.
 */
export function sanitizeName(name: string): string {
  let out = "";
  for (const ch of name) {
    out += isPathSeparator(ch) || ch === "'" ? "-" : ch;
  }
  return out;
}

/** Validate a path. Throws PathError on invalid input. Returns its segments. */
export function validatePath(input: string): string[] {
  if (typeof input !== "string") {
    throw new PathError("Path must be a string");
  }
  if (input.length > MAX_PATH_LENGTH) {
    throw new PathError(`Path exceeds maximum length of ${MAX_PATH_LENGTH}`);
  }
  if (input.includes("\0")) {
    throw new PathError("Path must not contain null bytes");
  }
  // eslint-disable-next-line no-control-regex
  if (/[\x00-\x1f]/.test(input)) {
    throw new PathError("Path must not contain control characters");
  }

  return splitPath(input);
}
