import {
  FileShareClientContext,
  ShareDirectoryHandle,
} from "./file-share-client-types.js";
import { joinSharePath } from "./paths.js";

export function directoryClient(
  this: FileShareClientContext,
  path: string,
): ShareDirectoryHandle {
  const normalized = joinSharePath(path);
  return normalized
    ? this.share.getDirectoryClient(normalized)
    : this.share.rootDirectoryClient;
}

export const directoryOperations = {
  /**
   * List the names of files (not subdirectories) in a directory
   */
  async listFiles(
    this: FileShareClientContext,
    directory: string,
  ): Promise<string[]> {
    const names: string[] = [];
    const dir = directoryClient.call(this, directory);
    for await (const item of dir.listFilesAndDirectories()) {
      if (item.kind === "file") {
        names.push(item.name);
      }
    }
    return names;
  },

  /**
   * Create a directory unless it already exists
   */
  async ensureDirectory(
    this: FileShareClientContext,
    path: string,
  ): Promise<void> {
    if (!joinSharePath(path)) return;
    await directoryClient.call(this, path).createIfNotExists();
  },
};
