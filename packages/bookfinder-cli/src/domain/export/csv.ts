import { open } from "node:fs/promises";

import { CliAppError, isErrnoException } from "bookfinder-cli-core";

import { toCalendarDay } from "../filter.js";
import type { Book } from "../types.js";

export const CSV_COLUMNS = ["title", "authors", "date", "topics", "url"] as const;
export const LIST_SEPARATOR = "; ";

export interface CsvFileHandle {
  write(data: string): Promise<unknown>;
  close(): Promise<void>;
}

export type OpenCsvFile = (path: string) => Promise<CsvFileHandle>;

export interface CsvExportResult {
  path: string;
  rows: number;
}

const openForWrite: OpenCsvFile = (path) => open(path, "w");

export function toCsvRow(book: Book): string {
  return [
    book.title,
    book.authors.join(LIST_SEPARATOR),
    toCalendarDay(book.issued) ?? "",
    book.topics.join(LIST_SEPARATOR),
    book.url,
  ]
    .map(escapeCsvValue)
    .join(",");
}

export function toCsv(books: readonly Book[]): string {
  return [CSV_COLUMNS.join(","), ...books.map(toCsvRow)].map((line) => `${line}\n`).join("");
}

export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Writes one header line and one line per book. The handle is closed on
 * every path; a failed write or close can leave a partial file behind.
 */
export async function exportCsv(
  books: readonly Book[],
  path: string,
  openFile: OpenCsvFile = openForWrite,
): Promise<CsvExportResult> {
  let handle: CsvFileHandle;
  try {
    handle = await openFile(path);
  } catch (error) {
    throw buildWriteError(path, error);
  }

  let failure: CliAppError | undefined;
  try {
    await handle.write(`${CSV_COLUMNS.join(",")}\n`);
    for (const book of books) {
      await handle.write(`${toCsvRow(book)}\n`);
    }
  } catch (error) {
    failure = buildWriteError(path, error);
  }

  try {
    await handle.close();
  } catch (error) {
    // A write failure is reported over a close failure.
    if (failure === undefined) {
      failure = buildWriteError(path, error);
    }
  }

  if (failure !== undefined) {
    throw failure;
  }

  return {
    path,
    rows: books.length,
  };
}

function buildWriteError(path: string, error: unknown): CliAppError {
  const reason = error instanceof Error ? error.message : String(error);
  const errno = isErrnoException(error) ? error.code : undefined;
  const message =
    errno === "EISDIR"
      ? `Cannot write CSV to ${path}: path is a directory`
      : `Failed to write CSV to ${path}`;

  return new CliAppError({
    code: "E_IO_WRITE",
    message,
    details: {
      path,
      reason,
      errno,
    },
    cause: error,
  });
}
