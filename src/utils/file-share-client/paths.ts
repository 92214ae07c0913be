/**
 * Join share path segments, dropping empty ones ("" is the share root)
 */
export function joinSharePath(...segments: string[]): string {
  return segments
    .flatMap((segment) => segment.split("/"))
    .filter((part) => part.length > 0)
    .join("/");
}

/**
 * Split "a/b/c.html" into its directory ("a/b") and file name ("c.html")
 */
export function splitSharePath(path: string): {
  directory: string;
  fileName: string;
} {
  const normalized = joinSharePath(path);
  const slash = normalized.lastIndexOf("/");
  if (slash === -1) {
    return { directory: "", fileName: normalized };
  }
  return {
    directory: normalized.slice(0, slash),
    fileName: normalized.slice(slash + 1),
  };
}
