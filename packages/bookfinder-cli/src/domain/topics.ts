import { CliAppError } from "bookfinder-cli-core";

import type { Topic } from "./types.js";

function topic(id: string, name: string, ...aliases: string[]): Topic {
  return { id, name, aliases };
}

export const TOPICS: readonly Topic[] = [
  topic("python", "Python", "py"),
  topic("javascript", "JavaScript", "js"),
  topic("java", "Java"),
  topic("data-science", "Data Science", "datascience"),
  topic("machine-learning", "Machine Learning", "ml"),
  topic("web-development", "Web Development", "web", "webdev"),
  topic("devops", "DevOps"),
  topic("security", "Security", "infosec"),
  topic("cloud", "Cloud", "cloud-computing"),
  topic("databases", "Databases", "database", "db"),
  topic("programming", "Programming"),
  topic("software-engineering", "Software Engineering", "swe"),
  topic("artificial-intelligence", "Artificial Intelligence", "ai"),
  topic("data-analysis", "Data Analysis", "analytics"),
  topic("deep-learning", "Deep Learning", "dl"),
  topic("statistics", "Statistics", "stats"),
  topic("big-data", "Big Data", "bigdata"),
];

export const DEFAULT_TOPIC_IDS: readonly string[] = [
  "data-science",
  "machine-learning",
  "artificial-intelligence",
  "data-analysis",
  "deep-learning",
  "statistics",
  "big-data",
];

export function allTopics(): Topic[] {
  return [...TOPICS];
}

export function defaultTopics(): Topic[] {
  return TOPICS.filter((item) => DEFAULT_TOPIC_IDS.includes(item.id));
}

export function isDefaultTopic(item: Topic): boolean {
  return DEFAULT_TOPIC_IDS.includes(item.id);
}

function normalizeTopicKey(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

const TOPIC_INDEX: ReadonlyMap<string, Topic> = buildTopicIndex(TOPICS);

function buildTopicIndex(topics: readonly Topic[]): Map<string, Topic> {
  const index = new Map<string, Topic>();
  for (const item of topics) {
    index.set(normalizeTopicKey(item.id), item);
    index.set(normalizeTopicKey(item.name), item);
    for (const alias of item.aliases) {
      index.set(normalizeTopicKey(alias), item);
    }
  }
  return index;
}

export function findTopic(name: string): Topic | undefined {
  return TOPIC_INDEX.get(normalizeTopicKey(name));
}

export function resolveTopic(name: string): Topic {
  const found = findTopic(name);
  if (found === undefined) {
    throw buildUnknownTopicError([name.trim()]);
  }
  return found;
}

export interface ResolveTopicsResult {
  topics: Topic[];
  invalid: string[];
}

/**
 * Resolves repeated and comma-separated topic inputs.
 * Duplicates collapse onto their first occurrence.
 */
export function resolveTopics(inputs: string[]): ResolveTopicsResult {
  const topics: Topic[] = [];
  const invalid: string[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    for (const token of input.split(",")) {
      const trimmed = token.trim();
      if (trimmed.length === 0) {
        continue;
      }

      const found = findTopic(trimmed);
      if (found === undefined) {
        invalid.push(trimmed);
        continue;
      }

      if (!seen.has(found.id)) {
        seen.add(found.id);
        topics.push(found);
      }
    }
  }

  return { topics, invalid };
}

export function buildUnknownTopicError(invalid: string[]): CliAppError {
  const label =
    invalid.length === 1 ? `Unknown topic: ${invalid[0]}` : `Unknown topics: ${invalid.join(", ")}`;
  return new CliAppError({
    code: "E_TOPIC_UNKNOWN",
    message: `${label}. Run \`bookfinder search --list-topics\` to see available topics.`,
    details: {
      invalid,
      allowed: TOPICS.map((item) => item.id),
    },
  });
}
