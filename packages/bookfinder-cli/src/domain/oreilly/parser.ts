import { CliAppError } from "bookfinder-cli-core";

import type { Book, SearchResult } from "../types.js";

export const PLATFORM_ORIGIN = "https://learning.oreilly.com";

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts either a bare array of records or the paged object form
 * (`{ results: [...], total: n }`) the v2 search endpoint returns.
 */
export function parseSearchResponse(body: unknown, origin: string = PLATFORM_ORIGIN): SearchResult {
  if (Array.isArray(body)) {
    return { items: parseRecords(body, origin) };
  }

  if (isRecord(body) && Array.isArray(body.results)) {
    const total =
      typeof body.total === "number" && Number.isFinite(body.total) ? body.total : undefined;
    return {
      items: parseRecords(body.results, origin),
      total,
    };
  }

  throw new CliAppError({
    code: "E_UPSTREAM_PARSE",
    message: "Unexpected search response shape: expected a results array",
    details: {
      received: describeShape(body),
    },
  });
}

function parseRecords(records: unknown[], origin: string): Book[] {
  return records.map((record, index) => {
    if (!isRecord(record)) {
      throw new CliAppError({
        code: "E_UPSTREAM_PARSE",
        message: `Unexpected search result at index ${index}: expected an object`,
        details: {
          index,
          received: describeShape(record),
        },
      });
    }
    return parseBookRecord(record, origin);
  });
}

export function parseBookRecord(record: JsonRecord, origin: string = PLATFORM_ORIGIN): Book {
  const url = resolveBookUrl(firstString(record.web_url, record.url), origin);
  const book: Book = {
    id: firstString(record.archive_id, record.isbn, record.ourn, record.id) ?? url,
    title: firstString(record.title) ?? "",
    authors: toStringList(record.authors),
    topics: parseTopics(record),
    url,
  };

  const issued = firstString(record.issued, record.publication_date, record.published);
  if (issued !== undefined) {
    book.issued = issued;
  }

  return book;
}

function parseTopics(record: JsonRecord): string[] {
  const fromTopics = toStringList(record.topics);
  if (fromTopics.length > 0) {
    return fromTopics;
  }
  return toStringList(record.topics_payload);
}

function toStringList(value: unknown): string[] {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? [trimmed] : [];
  }

  if (!Array.isArray(value)) {
    return [];
  }

  const result: string[] = [];
  for (const entry of value) {
    const text = isRecord(entry)
      ? firstString(entry.name, entry.slug, entry.title)
      : firstString(entry);
    if (text !== undefined) {
      result.push(text);
    }
  }
  return result;
}

function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

function resolveBookUrl(value: string | undefined, origin: string): string {
  if (value === undefined) {
    return "";
  }

  try {
    return new URL(value, origin).toString();
  } catch {
    return value;
  }
}

function describeShape(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}
