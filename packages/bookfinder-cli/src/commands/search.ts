import type { Logger } from "bookfinder-cli-core";

import type { CatalogClient } from "../domain/client.js";
import { exportCsv, type OpenCsvFile } from "../domain/export/csv.js";
import { filterByDate, filterByTopics, toCalendarDay } from "../domain/filter.js";
import { buildSearchRequest } from "../domain/query.js";
import { defaultTopics } from "../domain/topics.js";
import type { Book, SearchOptions, SearchRequest } from "../domain/types.js";

export interface SearchCommandInput {
  options: SearchOptions;
  outputPath?: string;
  strictTopics?: boolean;
  dryRun?: boolean;
  openFile?: OpenCsvFile;
  logger?: Logger;
}

export interface SearchCommandOutput {
  request: SearchRequest;
  dryRun: boolean;
  requestUrl?: string;
  after?: string;
  before?: string;
  matchedTotal?: number;
  fetched: number;
  returned: number;
  outputPath?: string;
  items: Book[];
}

export async function runSearchCommand(
  client: CatalogClient,
  input: SearchCommandInput,
): Promise<SearchCommandOutput> {
  const { options, logger } = input;
  const request = buildSearchRequest(options, defaultTopics());
  const requestUrl = client.describeRequest?.(request);
  const range = { after: options.after, before: options.before };

  if (input.dryRun) {
    return {
      request,
      dryRun: true,
      requestUrl,
      ...range,
      fetched: 0,
      returned: 0,
      outputPath: input.outputPath,
      items: [],
    };
  }

  const result = await client.search(request);
  let items = filterByDate(result.items, range);
  if (input.strictTopics) {
    items = filterByTopics(items, options.topics.length > 0 ? options.topics : defaultTopics());
  }
  logger?.debug(`Kept ${items.length} of ${result.items.length} result(s) after filtering`);

  if (input.outputPath !== undefined) {
    const exported = await exportCsv(items, input.outputPath, input.openFile);
    logger?.debug(`Wrote ${exported.rows} row(s) to ${exported.path}`);
  }

  return {
    request,
    dryRun: false,
    requestUrl,
    ...range,
    matchedTotal: result.total,
    fetched: result.items.length,
    returned: items.length,
    outputPath: input.outputPath,
    items,
  };
}

const RULE = "-".repeat(80);

export function renderSearchOutput(output: SearchCommandOutput): string {
  const { request } = output;
  const lines: string[] = [
    `Search: ${request.query}${request.author ? ` | Author: ${request.author}` : ""}`,
    `Topics: ${request.topics.length > 0 ? request.topics.join(", ") : "all"}`,
    `Page: ${request.page} | Limit: ${request.limit}`,
  ];

  if (output.dryRun) {
    lines.push(`Request: ${output.requestUrl ?? "(unavailable)"}`, "Dry run: no request sent.");
    return lines.join("\n");
  }

  if (typeof output.matchedTotal === "number") {
    lines.push(`Matched: ${output.matchedTotal}`);
  }
  lines.push(`Returned: ${output.returned}`);

  if (output.outputPath !== undefined) {
    lines.push(`Results saved to ${output.outputPath}`);
    return lines.join("\n");
  }

  if (output.items.length === 0) {
    lines.push("", "No results found.");
    return lines.join("\n");
  }

  for (const book of output.items) {
    lines.push("", ...renderBook(book), RULE);
  }

  return lines.join("\n");
}

export function renderBook(book: Book): string[] {
  return [
    `Title: ${book.title.length > 0 ? book.title : "N/A"}`,
    `Authors: ${book.authors.length > 0 ? book.authors.join(", ") : "N/A"}`,
    `Published: ${toCalendarDay(book.issued) ?? "N/A"}`,
    `Topics: ${book.topics.length > 0 ? book.topics.join(", ") : "N/A"}`,
    `URL: ${book.url.length > 0 ? book.url : "N/A"}`,
  ];
}
