export interface Topic {
  /** Identifier the search API expects, e.g. `data-science`. */
  id: string;
  name: string;
  aliases: string[];
}

export interface Book {
  id: string;
  title: string;
  authors: string[];
  /** Publication date as returned by the API (`issued`), usually ISO 8601. */
  issued?: string;
  topics: string[];
  url: string;
}

export interface SearchOptions {
  query?: string;
  author?: string;
  /** Explicitly requested topics; empty means "use the defaults" unless `allTopics`. */
  topics: Topic[];
  allTopics: boolean;
  after?: string;
  before?: string;
  page: number;
  limit: number;
  fields?: string[];
}

export interface SearchRequest {
  query: string;
  author?: string;
  topics: string[];
  formats: string[];
  limit: number;
  page: number;
  fields?: string[];
}

export interface SearchResult {
  items: Book[];
  total?: number;
}

export interface DateRange {
  after?: string;
  before?: string;
}
