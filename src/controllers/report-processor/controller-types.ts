import {
  PassSummary,
  ProcessorConfig,
  ReportIndex,
  ReportStore,
} from "../../models/types.js";

// This interface defines the shape of the processor that will be used as 'this'
export interface ReportProcessorContext {
  store: ReportStore;
  index: ReportIndex;
  config: ProcessorConfig;
  createId: () => string;
  processedFiles: Set<string>;
  ready: boolean;
  running: boolean;
  pollingEnabled: boolean;
  pollTimer: NodeJS.Timeout | null;
  pollGeneration: number;
  passes: number;
  totalProcessed: number;
  totalFailed: number;
  lastPass: PassSummary | null;
  lastError: string | null;
}
