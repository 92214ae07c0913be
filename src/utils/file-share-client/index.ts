import { ShareServiceClient } from "@azure/storage-file-share";
import type { TokenCredential } from "@azure/identity";
import { ReportStore, StorageAuth } from "../../models/types.js";
import { directoryOperations } from "./directory-operations.js";
import { fileOperations } from "./file-operations.js";
import {
  FileShareClientContext,
  ShareHandle,
} from "./file-share-client-types.js";

/**
 * Azure file share wrapper used as the processor's report store
 */
export class FileShareClient implements FileShareClientContext, ReportStore {
  public share: ShareHandle;

  // Mix in the operations
  public listFiles: typeof directoryOperations.listFiles;
  public ensureDirectory: typeof directoryOperations.ensureDirectory;

  public readFile: typeof fileOperations.readFile;
  public writeFile: typeof fileOperations.writeFile;
  public deleteFile: typeof fileOperations.deleteFile;

  constructor(share: ShareHandle) {
    this.share = share;

    this.listFiles = directoryOperations.listFiles.bind(this);
    this.ensureDirectory = directoryOperations.ensureDirectory.bind(this);

    this.readFile = fileOperations.readFile.bind(this);
    this.writeFile = fileOperations.writeFile.bind(this);
    this.deleteFile = fileOperations.deleteFile.bind(this);
  }

  /**
   * Connect with an account key (connection string) or with the pod's
   * managed identity
   */
  static connect(
    auth: StorageAuth,
    shareName: string,
    credential: TokenCredential,
  ): FileShareClient {
    const service =
      auth.kind === "connection-string"
        ? ShareServiceClient.fromConnectionString(auth.connectionString)
        : new ShareServiceClient(
            `https://${auth.accountName}.file.core.windows.net`,
            credential,
            // Azure Files only accepts OAuth tokens with a backup intent
            { fileRequestIntent: "backup" },
          );
    return new FileShareClient(service.getShareClient(shareName));
  }
}
