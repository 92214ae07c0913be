import {
  AzureKeyCredential,
  SearchClient,
  SearchIndexClient,
} from "@azure/search-documents";
import type { TokenCredential } from "@azure/identity";
import { ReportIndex, TestReportDocument } from "../../models/types.js";
import { IndexingError, isNotFound } from "../errors.js";
import logger from "../logger.js";
import { createReportIndexDefinition } from "./index-schema.js";

export type IndexAdmin = Pick<SearchIndexClient, "getIndex" | "createIndex">;
export type DocumentUploader = Pick<
  SearchClient<TestReportDocument>,
  "uploadDocuments"
>;

export interface SearchConnection {
  endpoint: string;
  indexName: string;
  apiKey?: string;
}

/**
 * Azure AI Search wrapper for the test report index
 */
export class ReportIndexClient implements ReportIndex {
  constructor(
    private indexAdmin: IndexAdmin,
    private uploader: DocumentUploader,
    public readonly indexName: string,
  ) {}

  static fromConnection(
    connection: SearchConnection,
    tokenCredential: TokenCredential,
  ): ReportIndexClient {
    const credential = connection.apiKey
      ? new AzureKeyCredential(connection.apiKey)
      : tokenCredential;
    return new ReportIndexClient(
      new SearchIndexClient(connection.endpoint, credential),
      new SearchClient<TestReportDocument>(
        connection.endpoint,
        connection.indexName,
        credential,
      ),
      connection.indexName,
    );
  }

  async ensureIndex(): Promise<void> {
    try {
      await this.indexAdmin.getIndex(this.indexName);
      logger.info(`Index '${this.indexName}' exists.`);
      return;
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }

    await this.indexAdmin.createIndex(
      createReportIndexDefinition(this.indexName),
    );
    logger.info(`Created index '${this.indexName}'.`);
  }

  async indexDocument(doc: TestReportDocument): Promise<void> {
    const response = await this.uploader.uploadDocuments([doc]);
    const failed = response.results.find((result) => !result.succeeded);
    if (failed) {
      throw new IndexingError(
        failed.key,
        failed.errorMessage ?? `status ${failed.statusCode}`,
      );
    }
    logger.info(`Indexed document ID: ${doc.id}`);
  }
}
