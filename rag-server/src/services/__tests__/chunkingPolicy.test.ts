import { describe, it, expect } from "vitest";

import { ChunkingPolicy } from "../chunkingPolicy";

describe("ChunkingPolicy", () => {
  const policy = new ChunkingPolicy();

  it("returns no chunks for empty or whitespace-only text", () => {
    expect(policy.split("")).toEqual([]);
    expect(policy.split("  \n\n\t ")).toEqual([]);
  });

  it("keeps short text as a single trimmed chunk", () => {
    expect(policy.split("  A single short paragraph.  ")).toEqual([
      "A single short paragraph.",
    ]);
  });

  it("breaks on paragraph boundaries before anything else", () => {
    const first = "x".repeat(600);
    const second = "y".repeat(600);

    expect(policy.split(`${first}\n\n${second}`)).toEqual([first, second]);
  });

  it("hard-cuts text without separators and overlaps consecutive pieces", () => {
    const text = Array.from({ length: 2500 }, (_, i) =>
      String.fromCharCode(97 + (i % 26))
    ).join("");

    const chunks = policy.split(text);

    expect(chunks.map((chunk) => chunk.length)).toEqual([1000, 1000, 900]);
    expect(chunks[0]).toBe(text.slice(0, 1000));
    expect(chunks[1]).toBe(text.slice(800, 1800));
    expect(chunks[2]).toBe(text.slice(1600));
  });

  it("merges words into bounded chunks that share an overlap", () => {
    const small = new ChunkingPolicy({ chunkSize: 20, chunkOverlap: 10 });

    expect(small.split("one two three four five six seven")).toEqual([
      "one two three four",
      "three four five six",
      "five six seven",
    ]);
  });

  it("is deterministic", () => {
    const text = "Lorem ipsum dolor sit amet.\n".repeat(120);

    expect(policy.split(text)).toEqual(policy.split(text));
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => new ChunkingPolicy({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      "chunkOverlap must be in [0, 100), got 100"
    );
  });
});
