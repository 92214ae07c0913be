import { readFileSync } from "fs";
import { afterEach, describe, expect, it, vi } from "vitest";
import logger from "../src/utils/logger.js";
import {
  cleanupJsonBlob,
  parseJsonBlob,
  parseReport,
} from "../src/utils/report-parser.js";
import { sequentialIds } from "./helpers/fakes.js";

const fixture = readFileSync(
  new URL("./fixtures/report.html", import.meta.url),
  "utf-8",
);

function page(body: string): string {
  return `<!DOCTYPE html><html><body>${body}</body></html>`;
}

describe("parseReport", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("extracts the environment from a pytest-html report", () => {
    const doc = parseReport(fixture, { createId: sequentialIds() });

    expect(doc).toEqual({
      id: "doc-1",
      timestamp: "14-Mar-2025 at 09:12:45",
      python_version: "3.11.4",
      platform: "Linux-5.15.0-x86_64-with-glibc2.35",
      packages: ["pytest: 8.1.1", "pluggy: 1.4.0"],
      plugins: ["html: 4.1.1", "metadata: 3.1.1"],
      playwright_platform: "chromium",
    });
  });

  it("generates a UUID when no id factory is given", () => {
    const doc = parseReport(fixture);
    expect(doc.id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it("repairs single quotes and trailing commas in the blob", () => {
    const html = page(
      `<p>Report generated on 01-Feb-2025 at 10:00:00 by pytest-html</p>` +
        `<div id="data-container" data-jsonblob="{'environment': {'Python': '3.10.2', 'Packages': {'pytest': '7.4.0',},},}"></div>`,
    );

    const doc = parseReport(html, { createId: () => "fixed" });

    expect(doc).toEqual({
      id: "fixed",
      timestamp: "01-Feb-2025 at 10:00:00",
      python_version: "3.10.2",
      platform: null,
      packages: ["pytest: 7.4.0"],
      plugins: [],
      playwright_platform: null,
    });
  });

  it("quotes bare keys and reads the lower-case plugins map", () => {
    const html = page(
      `<div id="data-container" data-jsonblob='{environment: {Python: "3.9", plugins: {cov: "4.1.0"}}}'></div>`,
    );

    const doc = parseReport(html, { createId: () => "fixed" });

    expect(doc.python_version).toBe("3.9");
    expect(doc.plugins).toEqual(["cov: 4.1.0"]);
  });

  it("stringifies numeric environment values", () => {
    const html = page(
      `<div id="data-container" data-jsonblob='{"environment": {"Python": 3.12, "Packages": {"pytest": 8}}}'></div>`,
    );

    const doc = parseReport(html, { createId: () => "fixed" });

    expect(doc.python_version).toBe("3.12");
    expect(doc.packages).toEqual(["pytest: 8"]);
  });

  it("falls back to an empty environment when the blob cannot be parsed", () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => logger);
    const html = page(
      `<p>Report generated on 02-Feb-2025 by ci</p>` +
        `<div id="data-container" data-jsonblob="not json at all"></div>`,
    );

    const doc = parseReport(html, { createId: () => "fixed" });

    expect(doc).toEqual({
      id: "fixed",
      timestamp: "02-Feb-2025",
      python_version: null,
      platform: null,
      packages: [],
      plugins: [],
      playwright_platform: null,
    });
    expect(errorSpy).toHaveBeenCalledWith(
      "Raw JSON (post-cleanup): not json at all",
    );
  });

  it("logs a data container that carries no blob", () => {
    const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => logger);

    const doc = parseReport(page(`<div id="data-container"></div>`), {
      createId: () => "fixed",
    });

    expect(doc.packages).toEqual([]);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenLastCalledWith("Raw JSON (post-cleanup): ");
  });

  it("writes a package without a version as null", () => {
    const html = page(
      `<div id="data-container" data-jsonblob='{"environment": {"Packages": {"pytest": "8.0.0", "local-plugin": null}}}'></div>`,
    );

    const doc = parseReport(html, { createId: () => "fixed" });

    expect(doc.packages).toEqual(["pytest: 8.0.0", "local-plugin: null"]);
  });

  it("returns empty fields for a page without report markup", () => {
    const doc = parseReport(page("<div>nothing here</div>"), {
      createId: () => "fixed",
    });

    expect(doc).toEqual({
      id: "fixed",
      timestamp: "",
      python_version: null,
      platform: null,
      packages: [],
      plugins: [],
      playwright_platform: null,
    });
  });

  it("only looks for the timestamp in the first paragraph", () => {
    const html = page(
      "<p>Summary</p><p>Report generated on 03-Mar-2025 by pytest-html</p>",
    );

    expect(parseReport(html).timestamp).toBe("");
  });
});

describe("cleanupJsonBlob", () => {
  it("applies every repair step", () => {
    expect(cleanupJsonBlob("{a: 1, 'b': [1, 2,],\n}")).toBe(
      '{"a": 1, "b": [1, 2]}',
    );
  });
});

describe("parseJsonBlob", () => {
  it("keeps apostrophes in strictly valid JSON", () => {
    expect(parseJsonBlob('{"name": "O\'Brien"}')).toEqual({ name: "O'Brien" });
  });
});
