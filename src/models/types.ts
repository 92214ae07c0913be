// Document stored in the search index, one per HTML test report
export interface TestReportDocument {
  id: string;
  timestamp: string;
  python_version: string | null;
  platform: string | null;
  packages: string[];
  plugins: string[];
  playwright_platform: string | null;
}

// Storage the processor polls (an Azure file share in production)
export interface ReportStore {
  listFiles(directory: string): Promise<string[]>;
  readFile(path: string): Promise<Buffer>;
  writeFile(path: string, content: Buffer): Promise<void>;
  deleteFile(path: string): Promise<void>;
  ensureDirectory(path: string): Promise<void>;
}

// Search index the processor feeds
export interface ReportIndex {
  ensureIndex(): Promise<void>;
  indexDocument(doc: TestReportDocument): Promise<void>;
}

export interface ProcessorConfig {
  directoryPath: string;
  processedFolder: string;
  errorFolder: string;
  fileExtension: string;
  pollIntervalSeconds: number;
}

export type FileOutcome =
  | { name: string; status: "processed"; documentId: string; moved: boolean }
  | { name: string; status: "failed"; error: string; moved: boolean };

export interface PassSummary {
  scanned: number;
  processed: number;
  failed: number;
  skipped: number;
  startedAt: string;
  finishedAt: string;
  outcomes: FileOutcome[];
}

export interface ProcessorStatus {
  ready: boolean;
  polling: boolean;
  running: boolean;
  passes: number;
  totalProcessed: number;
  totalFailed: number;
  lastPass: PassSummary | null;
  lastError: string | null;
}

export type StorageAuth =
  | { kind: "connection-string"; connectionString: string }
  | { kind: "managed-identity"; accountName: string };

export interface AppConfig {
  search: {
    endpoint: string;
    indexName: string;
    apiKey?: string;
  };
  storage: StorageAuth & { shareName: string };
  managedIdentityClientId?: string;
  processor: ProcessorConfig;
  httpPort: number;
}
