import { errorMessage } from "../../utils/errors.js";
import { joinSharePath } from "../../utils/file-share-client/paths.js";
import logger from "../../utils/logger.js";
import { ReportProcessor } from "./index.js";

/**
 * Location of a file in the polled directory
 */
export function sourcePath(this: ReportProcessor, fileName: string): string {
  return joinSharePath(this.config.directoryPath, fileName);
}

/**
 * Move a report to a folder at the share root (processed/ or error/).
 * The share has no rename across directories without SAS, so the file is
 * copied by download and upload, then the original is deleted.
 * Failures are logged and reported through the return value.
 */
export async function moveFile(
  this: ReportProcessor,
  fileName: string,
  targetFolder: string,
): Promise<boolean> {
  try {
    const src = this.sourcePath(fileName);
    const dest = joinSharePath(targetFolder, fileName);
    if (src === dest) {
      throw new Error(`source and destination are the same path (${src})`);
    }

    await this.store.ensureDirectory(targetFolder);
    const content = await this.store.readFile(src);
    await this.store.writeFile(dest, content);
    await this.store.deleteFile(src);

    logger.info(`Moved '${fileName}' to '${targetFolder}/'.`);
    return true;
  } catch (error) {
    logger.error(
      `Failed to move '${fileName}' to '${targetFolder}/': ${errorMessage(error)}`,
    );
    return false;
  }
}
