import { FileOutcome, PassSummary } from "../../models/types.js";
import { errorMessage } from "../../utils/errors.js";
import logger from "../../utils/logger.js";
import { parseReport } from "../../utils/report-parser.js";
import { ReportProcessor } from "./index.js";

/**
 * Index a single report and file it under the processed or error folder
 */
export async function processFile(
  this: ReportProcessor,
  fileName: string,
): Promise<FileOutcome> {
  logger.info(`Processing file: ${fileName}`);
  try {
    const content = await this.store.readFile(this.sourcePath(fileName));
    const doc = parseReport(content.toString("utf-8"), {
      createId: this.createId,
    });
    await this.index.indexDocument(doc);
    // Remembered before the move so a failed move never indexes twice
    this.processedFiles.add(fileName);

    const moved = await this.moveFile(fileName, this.config.processedFolder);
    return { name: fileName, status: "processed", documentId: doc.id, moved };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Error processing '${fileName}': ${message}`);
    const moved = await this.moveFile(fileName, this.config.errorFolder);
    return { name: fileName, status: "failed", error: message, moved };
  }
}

/**
 * Run one pass over the polled directory. Returns null when a pass is
 * already in progress.
 */
export async function processFiles(
  this: ReportProcessor,
): Promise<PassSummary | null> {
  if (this.running) {
    logger.warn("Processing pass already running, skipping");
    return null;
  }
  this.running = true;

  const startedAt = new Date().toISOString();
  const outcomes: FileOutcome[] = [];
  let scanned = 0;
  let skipped = 0;

  try {
    const names = await this.store.listFiles(this.config.directoryPath);
    for (const name of names) {
      scanned++;
      if (
        !name.endsWith(this.config.fileExtension) ||
        this.processedFiles.has(name)
      ) {
        skipped++;
        continue;
      }
      outcomes.push(await this.processFile(name));
    }
  } catch (error) {
    this.lastError = errorMessage(error);
    throw error;
  } finally {
    this.running = false;
  }

  const processed = outcomes.filter((o) => o.status === "processed").length;
  const summary: PassSummary = {
    scanned,
    processed,
    failed: outcomes.length - processed,
    skipped,
    startedAt,
    finishedAt: new Date().toISOString(),
    outcomes,
  };

  this.passes++;
  this.totalProcessed += summary.processed;
  this.totalFailed += summary.failed;
  this.lastPass = summary;
  this.lastError = null;

  if (outcomes.length > 0) {
    logger.info(
      `Pass finished: ${summary.processed} processed, ${summary.failed} failed`,
    );
  }
  return summary;
}
