import type { Logger } from "bookfinder-cli-core";

import { DEFAULT_TIMEOUT_MS, HttpSession } from "./http/session.js";
import { PLATFORM_ORIGIN, parseSearchResponse } from "./oreilly/parser.js";
import { toSearchParams } from "./query.js";
import type { Book, SearchRequest, SearchResult } from "./types.js";

export interface CatalogClient {
  search(request: SearchRequest): Promise<SearchResult>;
  /** URL the client would call for a request; used by `--dry-run`. */
  describeRequest?: (request: SearchRequest) => string;
}

export interface OreillyClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export const DEFAULT_BASE_URL = PLATFORM_ORIGIN;
export const SEARCH_PATH = "/api/v2/search/";

export function createOreillyClient(options: OreillyClientOptions = {}): CatalogClient {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const session = new HttpSession({
    baseUrl,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    fetchImpl: options.fetchImpl,
    userAgent: "bookfinder-cli",
    logger: options.logger,
  });
  const origin = session.buildUrl("/").origin;

  return {
    async search(request: SearchRequest): Promise<SearchResult> {
      const body = await session.getJson(
        {
          pathOrUrl: SEARCH_PATH,
          params: toSearchParams(request),
        },
        "O'Reilly search request failed",
      );
      const result = parseSearchResponse(body, origin);
      options.logger?.debug(
        `Parsed ${result.items.length} result(s)${
          result.total === undefined ? "" : ` of ${result.total}`
        }`,
      );
      return result;
    },

    describeRequest(request: SearchRequest): string {
      return session.buildUrl(SEARCH_PATH, toSearchParams(request)).toString();
    },
  };
}

const SAMPLE_BOOKS: Book[] = [
  {
    id: "9781000000011",
    title: "Practical Machine Learning Pipelines",
    authors: ["Ada Example", "Ben Placeholder"],
    issued: "2023-04-18T00:00:00Z",
    topics: ["Machine Learning", "Python"],
    url: "https://learning.oreilly.com/library/view/-/9781000000011/",
  },
  {
    id: "9781000000028",
    title: "Statistics for Data Teams",
    authors: ["Cora Sample"],
    issued: "2022-11-02T00:00:00Z",
    topics: ["Statistics", "Data Science"],
    url: "https://learning.oreilly.com/library/view/-/9781000000028/",
  },
  {
    id: "9781000000035",
    title: "Deep Learning from Scratch, Revisited",
    authors: ["Dev Fixture"],
    issued: "2024-02-20T00:00:00Z",
    topics: ["Deep Learning", "Artificial Intelligence"],
    url: "https://learning.oreilly.com/library/view/-/9781000000035/",
  },
  {
    id: "9781000000042",
    title: "Python Data Analysis Cookbook",
    authors: ["Eve Stub"],
    issued: "2023-09-05T00:00:00Z",
    topics: ["Python", "Data Analysis"],
    url: "https://learning.oreilly.com/library/view/-/9781000000042/",
  },
  {
    id: "9781000000059",
    title: "Cloud Native DevOps Handbook",
    authors: ["Finn Mock"],
    issued: "2021-06-30T00:00:00Z",
    topics: ["DevOps", "Cloud"],
    url: "https://learning.oreilly.com/library/view/-/9781000000059/",
  },
];

/**
 * In-process client over fixed records. Query words, author and topics
 * narrow the records roughly the way the remote API does.
 */
export function createMockCatalogClient(records: Book[] = SAMPLE_BOOKS): CatalogClient {
  return {
    async search(request: SearchRequest): Promise<SearchResult> {
      const words =
        request.query === "*"
          ? []
          : request.query
              .toLowerCase()
              .split(/\s+/)
              .filter((word) => word.length > 0);
      const author = request.author?.toLowerCase();
      const topics = request.topics.map((item) => item.replace(/-/g, " "));

      const matched = records.filter((book) => {
        const title = book.title.toLowerCase();
        if (!words.every((word) => title.includes(word))) {
          return false;
        }
        if (
          author !== undefined &&
          !book.authors.some((name) => name.toLowerCase().includes(author))
        ) {
          return false;
        }
        if (topics.length === 0) {
          return true;
        }
        return book.topics.some((name) => topics.includes(name.toLowerCase()));
      });

      const start = request.page * request.limit;
      return {
        items: matched.slice(start, start + request.limit),
        total: matched.length,
      };
    },

    describeRequest(request: SearchRequest): string {
      return `mock:${SEARCH_PATH}?${toSearchParams(request).toString()}`;
    },
  };
}
