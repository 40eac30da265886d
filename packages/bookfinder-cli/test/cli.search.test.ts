import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";

import { runCli } from "../src/cli.js";
import type { CatalogClient } from "../src/domain/client.js";
import type { Book, SearchRequest } from "../src/domain/types.js";

class BufferWriter {
  public chunks: string[] = [];

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public read(): string {
    return this.chunks.join("");
  }
}

function book(id: string, title: string, issued: string, topics: string[] = []): Book {
  return {
    id,
    title,
    authors: ["Ada Example"],
    issued,
    topics,
    url: `https://learning.oreilly.com/library/view/-/${id}/`,
  };
}

function createCapturingClient(items: Book[] = []): {
  client: CatalogClient;
  requests: SearchRequest[];
} {
  const requests: SearchRequest[] = [];
  const client: CatalogClient = {
    async search(request) {
      requests.push(request);
      return { items, total: items.length };
    },
  };
  return { client, requests };
}

const DEFAULT_TOPIC_IDS = [
  "data-science",
  "machine-learning",
  "artificial-intelligence",
  "data-analysis",
  "deep-learning",
  "statistics",
  "big-data",
];

describe("search command", () => {
  it("applies the default topics, limit 10 and page 0 to a plain query", async () => {
    const { client, requests } = createCapturingClient();
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();

    const exitCode = await runCli(["search", "machine", "learning"], { client, stdout, stderr });

    expect(exitCode).toBe(0);
    expect(requests).toEqual([
      {
        query: "machine learning",
        topics: DEFAULT_TOPIC_IDS,
        formats: ["book"],
        limit: 10,
        page: 0,
      },
    ]);
    expect(stderr.read()).toBe("");
  });

  it("passes explicit topics, author and pagination through", async () => {
    const { client, requests } = createCapturingClient();

    const exitCode = await runCli(
      [
        "search",
        "pandas",
        "-a",
        "Ada Example",
        "-t",
        "python",
        "--topic",
        "Data Analysis",
        "-l",
        "25",
        "-p",
        "2",
      ],
      { client, stdout: new BufferWriter(), stderr: new BufferWriter() },
    );

    expect(exitCode).toBe(0);
    expect(requests[0]).toEqual({
      query: "pandas",
      author: "Ada Example",
      topics: ["python", "data-analysis"],
      formats: ["book"],
      limit: 25,
      page: 2,
    });
  });

  it("drops the topic filter with --all-topics", async () => {
    const { client, requests } = createCapturingClient();

    await runCli(["search", "--all-topics", "kubernetes"], {
      client,
      stdout: new BufferWriter(),
      stderr: new BufferWriter(),
    });

    expect(requests[0]?.topics).toEqual([]);
    expect(requests[0]?.query).toBe("kubernetes");
  });

  it("keeps only books inside --after/--before, in relevance order", async () => {
    const { client } = createCapturingClient([
      book("b1", "Python 4 Preview", "2024-03-01T00:00:00Z"),
      book("b2", "Python on New Year", "2023-01-01T00:00:00Z"),
      book("b3", "Legacy Python", "2022-12-31T00:00:00Z"),
      book("b4", "Summer Python", "2023-07-04T00:00:00Z"),
      book("b5", "Python at Midnight", "2024-01-01T00:00:00Z"),
    ]);
    const stdout = new BufferWriter();

    const exitCode = await runCli(
      ["search", "python", "--after", "2023-01-01", "--before", "2024-01-01", "--json"],
      { client, stdout, stderr: new BufferWriter() },
    );
    const envelope = JSON.parse(stdout.read());

    expect(exitCode).toBe(0);
    expect(envelope.data.fetched).toBe(5);
    expect(envelope.data.returned).toBe(3);
    expect(envelope.data.items.map((item: Book) => item.id)).toEqual(["b2", "b4", "b5"]);
  });

  it("renders results for the terminal", async () => {
    const { client } = createCapturingClient([
      book("9781000000011", "Practical Machine Learning Pipelines", "2023-04-18T00:00:00Z", [
        "Machine Learning",
        "Python",
      ]),
    ]);
    const stdout = new BufferWriter();

    await runCli(["search", "python"], { client, stdout, stderr: new BufferWriter() });

    expect(stdout.read()).toBe(
      [
        "Search: python",
        `Topics: ${DEFAULT_TOPIC_IDS.join(", ")}`,
        "Page: 0 | Limit: 10",
        "Matched: 1",
        "Returned: 1",
        "",
        "Title: Practical Machine Learning Pipelines",
        "Authors: Ada Example",
        "Published: 2023-04-18",
        "Topics: Machine Learning, Python",
        "URL: https://learning.oreilly.com/library/view/-/9781000000011/",
        "-".repeat(80),
        "",
      ].join("\n"),
    );
  });

  it("reports an empty page", async () => {
    const { client } = createCapturingClient([]);
    const stdout = new BufferWriter();

    await runCli(["search", "cobol", "--all-topics", "-a", "Nobody"], {
      client,
      stdout,
      stderr: new BufferWriter(),
    });

    expect(stdout.read()).toBe(
      [
        "Search: cobol | Author: Nobody",
        "Topics: all",
        "Page: 0 | Limit: 10",
        "Matched: 0",
        "Returned: 0",
        "",
        "No results found.",
        "",
      ].join("\n"),
    );
  });

  it("writes a CSV file instead of printing results with --output", async () => {
    const { client } = createCapturingClient([
      book("b1", "Python Basics", "2023-02-01"),
      book("b2", "Python, Advanced", "2023-03-01"),
    ]);
    const path = join(mkdtempSync(join(tmpdir(), "bookfinder-cli-")), "results.csv");
    const stdout = new BufferWriter();

    const exitCode = await runCli(["search", "python", "--all-topics", "-o", path], {
      client,
      stdout,
      stderr: new BufferWriter(),
    });

    expect(exitCode).toBe(0);
    expect(stdout.read()).toBe(
      [
        "Search: python",
        "Topics: all",
        "Page: 0 | Limit: 10",
        "Matched: 2",
        "Returned: 2",
        `Results saved to ${path}`,
        "",
      ].join("\n"),
    );
    expect(readFileSync(path, "utf8").split("\n")).toEqual([
      "title,authors,date,topics,url",
      "Python Basics,Ada Example,2023-02-01,,https://learning.oreilly.com/library/view/-/b1/",
      '"Python, Advanced",Ada Example,2023-03-01,,https://learning.oreilly.com/library/view/-/b2/',
      "",
    ]);
  });

  it("fails with E_IO_WRITE when the CSV cannot be written", async () => {
    const { client } = createCapturingClient([book("b1", "Python Basics", "2023-02-01")]);
    const dir = mkdtempSync(join(tmpdir(), "bookfinder-cli-"));
    const stderr = new BufferWriter();

    const exitCode = await runCli(["search", "python", "-o", dir], {
      client,
      stdout: new BufferWriter(),
      stderr,
    });

    expect(exitCode).toBe(5);
    expect(stderr.read()).toBe(
      `Error (E_IO_WRITE): Cannot write CSV to ${dir}: path is a directory\n`,
    );
  });

  it("exits with the I/O code when the CSV file cannot be closed", async () => {
    const { client } = createCapturingClient([book("b1", "Python Basics", "2023-02-01")]);
    const stderr = new BufferWriter();

    const exitCode = await runCli(["search", "python", "--all-topics", "-o", "/virtual/out.csv"], {
      client,
      stdout: new BufferWriter(),
      stderr,
      openFile: async () => ({
        async write() {
          return undefined;
        },
        async close() {
          throw Object.assign(new Error("EIO: i/o error, close"), { code: "EIO" });
        },
      }),
    });

    expect(exitCode).toBe(5);
    expect(stderr.read()).toBe("Error (E_IO_WRITE): Failed to write CSV to /virtual/out.csv\n");
  });

  it("cross-checks topic membership with --strict-topics", async () => {
    const { client } = createCapturingClient([
      book("p1", "Python Web Scraping", "2023-01-01", ["Python", "Web Development"]),
      book("d1", "Deploying Everything", "2023-01-01", ["DevOps"]),
    ]);
    const stdout = new BufferWriter();

    await runCli(["search", "--topic", "python", "--strict-topics", "--json"], {
      client,
      stdout,
      stderr: new BufferWriter(),
    });

    expect(JSON.parse(stdout.read()).data.items.map((item: Book) => item.id)).toEqual(["p1"]);
  });

  it("fails on an unknown topic before any request is made", async () => {
    const { client, requests } = createCapturingClient();
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();

    const exitCode = await runCli(["search", "python", "--topic", "unknown-topic-xyz"], {
      client,
      stdout,
      stderr,
    });

    expect(exitCode).toBe(2);
    expect(requests).toHaveLength(0);
    expect(stdout.read()).toBe("");
    expect(stderr.read()).toBe(
      "Error (E_TOPIC_UNKNOWN): Unknown topic: unknown-topic-xyz. Run `bookfinder search --list-topics` to see available topics.\n",
    );
  });
});

describe("--list-topics", () => {
  it("prints every topic once and never touches the network", async () => {
    let fetchCalls = 0;
    const fetchImpl: typeof fetch = async () => {
      fetchCalls += 1;
      return new Response("[]");
    };
    const stdout = new BufferWriter();
    const stderr = new BufferWriter();

    const exitCode = await runCli(["search", "--list-topics"], { fetchImpl, stdout, stderr });
    const lines = stdout.read().trimEnd().split("\n");

    expect(exitCode).toBe(0);
    expect(fetchCalls).toBe(0);
    expect(stderr.read()).toBe("");
    expect(lines[0]).toBe("Available topics (* = searched by default):");
    expect(lines).toHaveLength(18);
    expect(lines[1]).toBe("  python                   Python");
    expect(lines[4]).toBe("* data-science             Data Science");
    for (const id of ["python", "devops", "big-data", "artificial-intelligence"]) {
      expect(lines.filter((line) => line.slice(2).split(" ")[0] === id)).toHaveLength(1);
    }
  });

  it("short-circuits other search flags", async () => {
    const { client, requests } = createCapturingClient();

    const exitCode = await runCli(["search", "python", "--list-topics", "--topic", "nope"], {
      client,
      stdout: new BufferWriter(),
      stderr: new BufferWriter(),
    });

    expect(exitCode).toBe(0);
    expect(requests).toHaveLength(0);
  });

  it("is also available as the topics command", async () => {
    const stdout = new BufferWriter();

    const exitCode = await runCli(["topics", "--json"], {
      stdout,
      stderr: new BufferWriter(),
      requestIdFactory: () => "req-topics",
    });
    const envelope = JSON.parse(stdout.read());

    expect(exitCode).toBe(0);
    expect(envelope.data.total).toBe(17);
    expect(envelope.data.topics[12]).toEqual({
      id: "artificial-intelligence",
      name: "Artificial Intelligence",
      aliases: ["ai"],
      isDefault: true,
    });
  });
});
