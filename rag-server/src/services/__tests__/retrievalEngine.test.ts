import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { KnowledgeStore } from "../knowledgeStore";
import { RetrievalEngine, dedupeByContent } from "../retrievalEngine";
import {
  FakeEmbeddings,
  makeTempDir,
  removeDir,
  textChunk,
} from "../../__tests__/fakes";

describe("RetrievalEngine", () => {
  let dir: string;
  let embeddings: FakeEmbeddings;
  let store: KnowledgeStore;
  let engine: RetrievalEngine;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    dir = await makeTempDir();
    embeddings = new FakeEmbeddings();
    store = new KnowledgeStore({ rootDir: dir, embeddings });
    await store.open();
    engine = new RetrievalEngine(store);
  });

  afterEach(async () => {
    await store.close();
    await removeDir(dir);
    vi.restoreAllMocks();
  });

  it("keeps only the first of chunks with identical content", async () => {
    await store.put([
      textChunk("d1", "A.pdf", "Quarterly revenue grew 12 percent"),
      textChunk("d2", "B.pdf", "Quarterly revenue grew 12 percent"),
      textChunk("d3", "B.pdf", "Staff headcount was flat"),
    ]);

    const outcome = await engine.retrieve("revenue");

    expect(outcome.status).toBe("found");
    expect(
      outcome.status === "found" && outcome.results.map((chunk) => chunk.id)
    ).toEqual(["d1", "d3"]);
  });

  it("honours an explicit k", async () => {
    await store.put([
      textChunk("d1", "A.pdf", "revenue one"),
      textChunk("d2", "A.pdf", "revenue two"),
      textChunk("d3", "A.pdf", "revenue three"),
    ]);

    const outcome = await engine.retrieve("revenue", 2);

    expect(
      outcome.status === "found" && outcome.results.map((chunk) => chunk.id)
    ).toEqual(["d1", "d2"]);
  });

  it("reports no matches for an empty store", async () => {
    expect(await engine.retrieve("anything")).toEqual({ status: "no_matches" });
  });

  it("reports a service error instead of throwing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await store.put([textChunk("d1", "A.pdf", "revenue")]);
    embeddings.failWith = new Error("embedding service down");

    expect(await engine.retrieve("revenue")).toEqual({
      status: "service_error",
      reason: "embedding service down",
    });
  });
});

describe("dedupeByContent", () => {
  it("ignores surrounding whitespace and preserves order", () => {
    const chunks = [
      textChunk("c1", "A.pdf", "beta"),
      textChunk("c2", "A.pdf", "alpha"),
      textChunk("c3", "B.pdf", "  beta\n"),
      textChunk("c4", "B.pdf", "gamma"),
    ];

    expect(dedupeByContent(chunks).map((chunk) => chunk.id)).toEqual([
      "c1",
      "c2",
      "c4",
    ]);
  });
});
