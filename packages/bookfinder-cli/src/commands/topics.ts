import { allTopics, isDefaultTopic } from "../domain/topics.js";

export interface TopicListEntry {
  id: string;
  name: string;
  aliases: string[];
  isDefault: boolean;
}

export interface TopicsCommandOutput {
  total: number;
  topics: TopicListEntry[];
}

export function runTopicsCommand(): TopicsCommandOutput {
  const topics = allTopics().map((item) => ({
    id: item.id,
    name: item.name,
    aliases: [...item.aliases],
    isDefault: isDefaultTopic(item),
  }));

  return {
    total: topics.length,
    topics,
  };
}

export function renderTopicsOutput(output: TopicsCommandOutput): string {
  const width = Math.max(...output.topics.map((item) => item.id.length));
  return [
    "Available topics (* = searched by default):",
    ...output.topics.map(
      (item) => `${item.isDefault ? "*" : " "} ${item.id.padEnd(width)}  ${item.name}`,
    ),
  ].join("\n");
}
