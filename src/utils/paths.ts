/** Rewrite Windows separators so stored paths and patterns always use "/". */
export function toPosixPath(path: string): string {
  return path.replace(/\\/g, "/");
}
