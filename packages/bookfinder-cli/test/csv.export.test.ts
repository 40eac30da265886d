import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, expect, it } from "vitest";

import { exportCsv, toCsv, toCsvRow, type CsvFileHandle } from "../src/domain/export/csv.js";
import type { Book } from "../src/domain/types.js";

const BOOKS: Book[] = [
  {
    id: "9781000000011",
    title: "Practical Machine Learning Pipelines",
    authors: ["Ada Example", "Ben Placeholder"],
    issued: "2023-04-18T00:00:00Z",
    topics: ["Machine Learning", "Python"],
    url: "https://learning.oreilly.com/library/view/-/9781000000011/",
  },
  {
    id: "9781000000035",
    title: 'Deep Learning, the "Hard" Way',
    authors: ["Dev Fixture"],
    topics: [],
    url: "https://learning.oreilly.com/library/view/-/9781000000035/",
  },
  {
    id: "9781000000042",
    title: "Python Data Analysis Cookbook",
    authors: ["Eve Stub"],
    issued: "2023-09-05",
    topics: ["Python", "Data Analysis"],
    url: "https://learning.oreilly.com/library/view/-/9781000000042/",
  },
];

function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), "bookfinder-csv-"));
}

describe("csv export", () => {
  it("joins lists and reduces dates to calendar days", () => {
    expect(toCsvRow(BOOKS[0])).toBe(
      "Practical Machine Learning Pipelines,Ada Example; Ben Placeholder,2023-04-18,Machine Learning; Python,https://learning.oreilly.com/library/view/-/9781000000011/",
    );
  });

  it("quotes values containing commas or quotes and leaves missing dates empty", () => {
    expect(toCsvRow(BOOKS[1])).toBe(
      '"Deep Learning, the ""Hard"" Way",Dev Fixture,,,https://learning.oreilly.com/library/view/-/9781000000035/',
    );
  });

  it("writes a header plus one row per book", async () => {
    const path = join(createTempDir(), "books.csv");

    const result = await exportCsv(BOOKS, path);
    const lines = readFileSync(path, "utf8").split("\n");

    expect(result).toEqual({ path, rows: 3 });
    expect(lines.at(-1)).toBe("");
    expect(lines.slice(0, -1)).toHaveLength(4);
    expect(lines[0]).toBe("title,authors,date,topics,url");
    expect(lines[3]).toBe(
      "Python Data Analysis Cookbook,Eve Stub,2023-09-05,Python; Data Analysis,https://learning.oreilly.com/library/view/-/9781000000042/",
    );
    expect(readFileSync(path, "utf8")).toBe(toCsv(BOOKS));
  });

  it("writes only the header for an empty result", async () => {
    const path = join(createTempDir(), "empty.csv");

    await exportCsv([], path);

    expect(readFileSync(path, "utf8")).toBe("title,authors,date,topics,url\n");
  });

  it("fails with E_IO_WRITE when the path is a directory", async () => {
    const dir = createTempDir();

    await expect(exportCsv(BOOKS, dir)).rejects.toMatchObject({
      code: "E_IO_WRITE",
      message: `Cannot write CSV to ${dir}: path is a directory`,
    });
  });

  it("closes the handle when a write fails partway", async () => {
    const written: string[] = [];
    let closed = 0;
    const handle: CsvFileHandle = {
      async write(data) {
        if (written.length === 2) {
          throw Object.assign(new Error("ENOSPC: no space left on device"), { code: "ENOSPC" });
        }
        written.push(data);
      },
      async close() {
        closed += 1;
      },
    };

    await expect(exportCsv(BOOKS, "/virtual/books.csv", async () => handle)).rejects.toMatchObject(
      {
        code: "E_IO_WRITE",
        message: "Failed to write CSV to /virtual/books.csv",
        details: { path: "/virtual/books.csv", errno: "ENOSPC" },
      },
    );
    expect(written).toHaveLength(2);
    expect(closed).toBe(1);
  });

  it("does not try to close a handle that never opened", async () => {
    await expect(
      exportCsv(BOOKS, "/virtual/books.csv", async () => {
        throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
      }),
    ).rejects.toMatchObject({ code: "E_IO_WRITE", details: { errno: "EACCES" } });
  });

  it("reports a failed close as E_IO_WRITE", async () => {
    const written: string[] = [];
    const handle: CsvFileHandle = {
      async write(data) {
        written.push(data);
      },
      async close() {
        throw Object.assign(new Error("EIO: i/o error, close"), { code: "EIO" });
      },
    };

    await expect(exportCsv([], "/virtual/empty.csv", async () => handle)).rejects.toMatchObject({
      code: "E_IO_WRITE",
      message: "Failed to write CSV to /virtual/empty.csv",
      details: { path: "/virtual/empty.csv", reason: "EIO: i/o error, close", errno: "EIO" },
    });
    expect(written).toEqual(["title,authors,date,topics,url\n"]);
  });

  it("keeps the write error when closing fails as well", async () => {
    const handle: CsvFileHandle = {
      async write() {
        throw Object.assign(new Error("ENOSPC: no space left on device"), { code: "ENOSPC" });
      },
      async close() {
        throw Object.assign(new Error("EIO: i/o error, close"), { code: "EIO" });
      },
    };

    await expect(exportCsv(BOOKS, "/virtual/books.csv", async () => handle)).rejects.toMatchObject(
      {
        code: "E_IO_WRITE",
        details: { errno: "ENOSPC", reason: "ENOSPC: no space left on device" },
      },
    );
  });
});
