// The parts of the @azure/storage-file-share clients the operations call
export interface ShareFileHandle {
  downloadToBuffer(): Promise<Buffer>;
  uploadData(data: Buffer): Promise<unknown>;
  delete(): Promise<unknown>;
}

export interface ShareDirectoryHandle {
  listFilesAndDirectories(): AsyncIterable<{
    kind: "file" | "directory";
    name: string;
  }>;
  createIfNotExists(): Promise<unknown>;
  getFileClient(fileName: string): ShareFileHandle;
}

export interface ShareHandle {
  rootDirectoryClient: ShareDirectoryHandle;
  getDirectoryClient(directoryName: string): ShareDirectoryHandle;
}

// Interface for the file share client context (used as 'this')
export interface FileShareClientContext {
  share: ShareHandle;
}
