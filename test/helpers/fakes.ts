import { vi } from "vitest";
import {
  ProcessorConfig,
  ReportIndex,
  ReportStore,
  TestReportDocument,
} from "../../src/models/types.js";

/**
 * File share stand-in keyed by full path ("dir/name.html")
 */
export class InMemoryReportStore implements ReportStore {
  files = new Map<string, Buffer>();
  directories = new Set<string>();
  failWrites = new Set<string>();

  put(path: string, content: string) {
    this.files.set(path, Buffer.from(content, "utf-8"));
  }

  async listFiles(directory: string): Promise<string[]> {
    const prefix = directory ? `${directory}/` : "";
    return [...this.files.keys()]
      .filter((path) => path.startsWith(prefix))
      .map((path) => path.slice(prefix.length))
      .filter((rest) => !rest.includes("/"));
  }

  async readFile(path: string): Promise<Buffer> {
    const content = this.files.get(path);
    if (!content) {
      throw Object.assign(new Error(`The specified resource does not exist: ${path}`), {
        statusCode: 404,
      });
    }
    return content;
  }

  async writeFile(path: string, content: Buffer): Promise<void> {
    if (this.failWrites.has(path)) {
      throw new Error(`write refused: ${path}`);
    }
    this.files.set(path, content);
  }

  async deleteFile(path: string): Promise<void> {
    this.files.delete(path);
  }

  async ensureDirectory(path: string): Promise<void> {
    this.directories.add(path);
  }
}

export class FakeReportIndex implements ReportIndex {
  documents: TestReportDocument[] = [];
  ensureIndex = vi.fn(async () => {});
  rejectWhen: (doc: TestReportDocument) => boolean = () => false;

  async indexDocument(doc: TestReportDocument): Promise<void> {
    if (this.rejectWhen(doc)) {
      throw new Error("Indexing rejected");
    }
    this.documents.push(doc);
  }
}

export function processorConfig(
  overrides: Partial<ProcessorConfig> = {},
): ProcessorConfig {
  return {
    directoryPath: "reports",
    processedFolder: "processed",
    errorFolder: "error",
    fileExtension: ".html",
    pollIntervalSeconds: 60,
    ...overrides,
  };
}

export function sequentialIds(prefix = "doc") {
  let n = 0;
  return () => `${prefix}-${++n}`;
}
