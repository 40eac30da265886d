import type { Book, DateRange, Topic } from "./types.js";

const CALENDAR_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

/** True for a real calendar date written as `YYYY-MM-DD`. */
export function isCalendarDay(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (match === null) {
    return false;
  }

  const year = Number.parseInt(match[1] ?? "", 10);
  const month = Number.parseInt(match[2] ?? "", 10);
  const day = Number.parseInt(match[3] ?? "", 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

/**
 * Reduces an API date (`2023-04-18`, `2023-04-18T00:00:00Z`, ...) to its
 * calendar day. Returns undefined when no date can be read.
 */
export function toCalendarDay(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  const match = CALENDAR_DAY_PATTERN.exec(trimmed);
  if (match !== null) {
    const day = `${match[1]}-${match[2]}-${match[3]}`;
    return isCalendarDay(day) ? day : undefined;
  }

  const parsed = Date.parse(trimmed);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return new Date(parsed).toISOString().slice(0, 10);
}

export function filterByDate(books: readonly Book[], range: DateRange): Book[] {
  const { after, before } = range;
  if (after === undefined && before === undefined) {
    return [...books];
  }

  return books.filter((book) => {
    const day = toCalendarDay(book.issued);
    if (day === undefined) {
      return false;
    }
    if (after !== undefined && day < after) {
      return false;
    }
    if (before !== undefined && day > before) {
      return false;
    }
    return true;
  });
}

function normalizeTopicLabel(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

export function filterByTopics(books: readonly Book[], topics: readonly Topic[]): Book[] {
  if (topics.length === 0) {
    return [...books];
  }

  const wanted = new Set<string>();
  for (const item of topics) {
    wanted.add(normalizeTopicLabel(item.id));
    wanted.add(normalizeTopicLabel(item.name));
  }

  return books.filter((book) =>
    book.topics.some((label) => wanted.has(normalizeTopicLabel(label))),
  );
}
