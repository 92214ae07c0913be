import { directoryClient } from "./directory-operations.js";
import {
  FileShareClientContext,
  ShareFileHandle,
} from "./file-share-client-types.js";
import { splitSharePath } from "./paths.js";

function fileClient(
  this: FileShareClientContext,
  path: string,
): ShareFileHandle {
  const { directory, fileName } = splitSharePath(path);
  return directoryClient.call(this, directory).getFileClient(fileName);
}

export const fileOperations = {
  /**
   * Download a whole file
   */
  async readFile(this: FileShareClientContext, path: string): Promise<Buffer> {
    return fileClient.call(this, path).downloadToBuffer();
  },

  /**
   * Create or overwrite a file with the given content
   */
  async writeFile(
    this: FileShareClientContext,
    path: string,
    content: Buffer,
  ): Promise<void> {
    await fileClient.call(this, path).uploadData(content);
  },

  async deleteFile(this: FileShareClientContext, path: string): Promise<void> {
    await fileClient.call(this, path).delete();
  },
};
