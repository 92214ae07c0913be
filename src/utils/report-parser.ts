import * as cheerio from "cheerio";
import { randomUUID } from "crypto";
import { TestReportDocument } from "../models/types.js";
import { errorMessage } from "./errors.js";
import logger from "./logger.js";

type JsonObject = { [key: string]: unknown };

export interface ParseOptions {
  createId?: () => string;
}

const TIMESTAMP_PATTERN = /Report generated on (.*?) by/;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalar(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

function entries(value: unknown): string[] {
  if (!isObject(value)) return [];
  return Object.entries(value).map(
    ([name, version]) => `${name}: ${scalar(version) ?? "null"}`,
  );
}

/**
 * Repair the loose JSON that report generators write into data-jsonblob:
 * single quotes, bare keys, trailing commas and embedded newlines.
 */
export function cleanupJsonBlob(raw: string): string {
  return raw
    .replace(/'/g, '"')
    .replace(/([{,]\s*)([A-Za-z0-9_]+)\s*:/g, '$1"$2":')
    .replace(/,\s*([}\]])/g, "$1")
    .trim()
    .replace(/\n/g, " ");
}

/**
 * Parse the environment blob, falling back to the lenient cleanup when
 * the attribute is not valid JSON. Returns null when both attempts fail.
 */
export function parseJsonBlob(raw: string): unknown {
  const strict = tryParse(raw);
  if (strict.ok) return strict.value;

  const cleaned = cleanupJsonBlob(raw);
  const lenient = tryParse(cleaned);
  if (lenient.ok) return lenient.value;

  logger.error(`Failed to parse JSON blob after cleanup: ${lenient.error}`);
  logger.error(`Raw JSON (post-cleanup): ${cleaned}`);
  return null;
}

function tryParse(
  text: string,
): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

export function extractTimestamp($: cheerio.CheerioAPI): string {
  const paragraph = $("p").first();
  if (paragraph.length === 0) return "";
  const match = TIMESTAMP_PATTERN.exec(paragraph.text());
  return match ? match[1] : "";
}

/**
 * Turn an HTML test report into a search document
 */
export function parseReport(
  html: string,
  options: ParseOptions = {},
): TestReportDocument {
  const createId = options.createId ?? randomUUID;
  const $ = cheerio.load(html);

  const timestamp = extractTimestamp($);

  let environment: JsonObject = {};
  const container = $("div#data-container");
  if (container.length > 0) {
    // A container without the attribute is logged like any unparseable blob
    const blob = parseJsonBlob(container.attr("data-jsonblob") ?? "");
    if (isObject(blob) && isObject(blob.environment)) {
      environment = blob.environment;
    }
  }

  return {
    id: createId(),
    timestamp,
    python_version: scalar(environment.Python),
    platform: scalar(environment.Platform),
    packages: entries(environment.Packages),
    plugins: entries(environment.Plugins ?? environment.plugins),
    playwright_platform: scalar(environment.PLATFORM),
  };
}
