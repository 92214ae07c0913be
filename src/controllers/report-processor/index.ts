import { randomUUID } from "crypto";
import {
  FileOutcome,
  PassSummary,
  ProcessorConfig,
  ProcessorStatus,
  ReportIndex,
  ReportStore,
} from "../../models/types.js";
import { ReportProcessorContext } from "./controller-types.js";
import { moveFile, sourcePath } from "./file-routing.js";
import { startPolling, stopPolling, waitForIdle } from "./polling.js";
import { processFile, processFiles } from "./processing.js";

export class ReportProcessor implements ReportProcessorContext {
  public store: ReportStore;
  public index: ReportIndex;
  public config: ProcessorConfig;
  public createId: () => string;
  public processedFiles = new Set<string>();
  public ready: boolean = false;
  public running: boolean = false;
  public pollingEnabled: boolean = false;
  public pollTimer: NodeJS.Timeout | null = null;
  public pollGeneration = 0;
  public passes = 0;
  public totalProcessed = 0;
  public totalFailed = 0;
  public lastPass: PassSummary | null = null;
  public lastError: string | null = null;

  constructor(
    store: ReportStore,
    index: ReportIndex,
    config: ProcessorConfig,
    createId: () => string = randomUUID,
  ) {
    this.store = store;
    this.index = index;
    this.config = config;
    this.createId = createId;
  }

  // Make sure the search index exists before the first pass
  async initialize() {
    await this.index.ensureIndex();
    this.ready = true;
  }

  // Processing
  async processFiles(): Promise<PassSummary | null> {
    return processFiles.call(this);
  }

  async processFile(fileName: string): Promise<FileOutcome> {
    return processFile.call(this, fileName);
  }

  // File routing
  async moveFile(fileName: string, targetFolder: string): Promise<boolean> {
    return moveFile.call(this, fileName, targetFolder);
  }

  sourcePath(fileName: string): string {
    return sourcePath.call(this, fileName);
  }

  // Polling
  startPolling(intervalSeconds?: number) {
    return startPolling.call(this, intervalSeconds);
  }

  stopPolling() {
    return stopPolling.call(this);
  }

  async waitForIdle(timeoutMs: number, intervalMs?: number): Promise<boolean> {
    return waitForIdle.call(this, timeoutMs, intervalMs);
  }

  getStatus(): ProcessorStatus {
    return {
      ready: this.ready,
      polling: this.pollingEnabled,
      running: this.running,
      passes: this.passes,
      totalProcessed: this.totalProcessed,
      totalFailed: this.totalFailed,
      lastPass: this.lastPass,
      lastError: this.lastError,
    };
  }
}
