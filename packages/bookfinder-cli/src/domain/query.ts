import type { SearchOptions, SearchRequest, Topic } from "./types.js";

export const MATCH_ALL_QUERY = "*";
export const BOOK_FORMATS: readonly string[] = ["book"];

/**
 * Builds the API request for one search. The default topic subset is passed in
 * by the caller so the builder stays free of ambient state.
 */
export function buildSearchRequest(
  options: SearchOptions,
  defaultTopics: readonly Topic[],
): SearchRequest {
  const query = options.query?.trim() ?? "";
  const author = options.author?.trim();

  const request: SearchRequest = {
    query: query.length > 0 ? query : MATCH_ALL_QUERY,
    topics: selectTopics(options, defaultTopics).map((item) => item.id),
    formats: [...BOOK_FORMATS],
    limit: options.limit,
    page: options.page,
  };

  if (author !== undefined && author.length > 0) {
    request.author = author;
  }

  const fields = options.fields?.map((field) => field.trim()).filter((field) => field.length > 0);
  if (fields !== undefined && fields.length > 0) {
    request.fields = fields;
  }

  return request;
}

function selectTopics(options: SearchOptions, defaultTopics: readonly Topic[]): readonly Topic[] {
  if (options.topics.length > 0) {
    return dedupeTopics(options.topics);
  }

  if (options.allTopics) {
    return [];
  }

  return dedupeTopics(defaultTopics);
}

function dedupeTopics(topics: readonly Topic[]): Topic[] {
  const seen = new Set<string>();
  const result: Topic[] = [];
  for (const item of topics) {
    if (!seen.has(item.id)) {
      seen.add(item.id);
      result.push(item);
    }
  }
  return result;
}

export const TOPIC_TERM_PREFIX = "topic:";

/** Query text as sent: the search words followed by one `topic:<id>` term per topic. */
export function toQueryText(request: SearchRequest): string {
  return [request.query, ...request.topics.map((id) => `${TOPIC_TERM_PREFIX}${id}`)].join(" ");
}

export function toSearchParams(request: SearchRequest): URLSearchParams {
  const params = new URLSearchParams({
    query: toQueryText(request),
  });

  for (const format of request.formats) {
    params.append("formats", format);
  }
  params.set("limit", String(request.limit));
  params.set("page", String(request.page));

  if (request.author !== undefined) {
    params.set("authors", request.author);
  }
  if (request.fields !== undefined && request.fields.length > 0) {
    params.set("fields", request.fields.join(","));
  }

  return params;
}
