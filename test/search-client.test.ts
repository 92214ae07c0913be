import { beforeEach, describe, expect, it, vi } from "vitest";
import { TestReportDocument } from "../src/models/types.js";
import { IndexingError } from "../src/utils/errors.js";
import logger from "../src/utils/logger.js";
import { ReportIndexClient } from "../src/utils/search-client/index.js";
import { createReportIndexDefinition } from "../src/utils/search-client/index-schema.js";

const doc: TestReportDocument = {
  id: "doc-1",
  timestamp: "14-Mar-2025 at 09:12:45",
  python_version: "3.11.4",
  platform: "Linux",
  packages: ["pytest: 8.1.1"],
  plugins: [],
  playwright_platform: null,
};

function notFound() {
  return Object.assign(new Error("Index not found"), { statusCode: 404 });
}

describe("ReportIndexClient", () => {
  const admin = { getIndex: vi.fn(), createIndex: vi.fn() };
  const uploader = { uploadDocuments: vi.fn() };
  let client: ReportIndexClient;

  beforeEach(() => {
    vi.resetAllMocks();
    vi.spyOn(logger, "info").mockImplementation(() => logger);
    client = new ReportIndexClient(admin, uploader, "testreports");
  });

  it("leaves an existing index alone", async () => {
    admin.getIndex.mockResolvedValue({ name: "testreports", fields: [] });

    await client.ensureIndex();

    expect(admin.getIndex).toHaveBeenCalledWith("testreports");
    expect(admin.createIndex).not.toHaveBeenCalled();
  });

  it("creates the index when it is missing", async () => {
    admin.getIndex.mockRejectedValue(notFound());

    await client.ensureIndex();

    expect(admin.createIndex).toHaveBeenCalledWith(
      createReportIndexDefinition("testreports"),
    );
    expect(logger.info).toHaveBeenCalledWith("Created index 'testreports'.");
  });

  it("propagates errors other than not-found", async () => {
    admin.getIndex.mockRejectedValue(
      Object.assign(new Error("Forbidden"), { statusCode: 403 }),
    );

    await expect(client.ensureIndex()).rejects.toThrow("Forbidden");
    expect(admin.createIndex).not.toHaveBeenCalled();
  });

  it("uploads a document", async () => {
    uploader.uploadDocuments.mockResolvedValue({
      results: [{ key: "doc-1", succeeded: true, statusCode: 201 }],
    });

    await client.indexDocument(doc);

    expect(uploader.uploadDocuments).toHaveBeenCalledWith([doc]);
    expect(logger.info).toHaveBeenCalledWith("Indexed document ID: doc-1");
  });

  it("raises when the service rejects the document", async () => {
    uploader.uploadDocuments.mockResolvedValue({
      results: [
        {
          key: "doc-1",
          succeeded: false,
          statusCode: 400,
          errorMessage: "Invalid field",
        },
      ],
    });

    await expect(client.indexDocument(doc)).rejects.toThrow(
      new IndexingError("doc-1", "Invalid field"),
    );
  });
});

describe("createReportIndexDefinition", () => {
  it("keys documents by id and makes environment fields searchable", () => {
    const index = createReportIndexDefinition("nightly");

    expect(index.name).toBe("nightly");
    expect(index.fields.map((f) => f.name)).toEqual([
      "id",
      "timestamp",
      "python_version",
      "platform",
      "packages",
      "plugins",
      "playwright_platform",
    ]);
    expect(index.fields[0]).toEqual({ name: "id", type: "Edm.String", key: true });
    expect(index.fields[4]).toEqual({
      name: "packages",
      type: "Collection(Edm.String)",
      searchable: true,
    });
  });
});
