import { SearchIndex } from "@azure/search-documents";

/**
 * Index definition for test report documents
 */
export function createReportIndexDefinition(name: string): SearchIndex {
  return {
    name,
    fields: [
      { name: "id", type: "Edm.String", key: true },
      { name: "timestamp", type: "Edm.String", filterable: true, searchable: true },
      { name: "python_version", type: "Edm.String", filterable: true, searchable: true },
      { name: "platform", type: "Edm.String", filterable: true, searchable: true },
      { name: "packages", type: "Collection(Edm.String)", searchable: true },
      { name: "plugins", type: "Collection(Edm.String)", searchable: true },
      { name: "playwright_platform", type: "Edm.String", filterable: true, searchable: true },
    ],
  };
}
