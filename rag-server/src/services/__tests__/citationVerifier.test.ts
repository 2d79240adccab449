import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  CitationVerifier,
  buildCitationPrompt,
  parseCitationResponse,
  resolveCitedIndices,
} from "../citationVerifier";
import { FakeGenerator, imageChunk, textChunk } from "../../__tests__/fakes";

const context = [
  textChunk("c1", "A.pdf", "Revenue was $5M in 2023."),
  textChunk("c2", "A.pdf", "The office moved to Lisbon."),
  imageChunk("c3", "B.pdf", "a chart of revenue by year", 2),
];

describe("parseCitationResponse", () => {
  it("accepts the expected object", () => {
    expect(
      parseCitationResponse('{"cited_sources": ["SOURCE_2", "SOURCE_1"]}')
    ).toEqual({ ok: true, labels: ["SOURCE_2", "SOURCE_1"] });
  });

  it("reads an object wrapped in a json code fence", () => {
    expect(
      parseCitationResponse('```json\n{"cited_sources": ["SOURCE_1"]}\n```')
    ).toEqual({ ok: true, labels: ["SOURCE_1"] });
  });

  it("keeps entries of any type for later filtering", () => {
    expect(parseCitationResponse('{"cited_sources": ["SOURCE_1", 2]}')).toEqual({
      ok: true,
      labels: ["SOURCE_1", 2],
    });
  });

  it("fails on text that is not JSON", () => {
    expect(parseCitationResponse("The answer cites SOURCE_1.").ok).toBe(false);
  });

  it("fails when the key is missing or has the wrong type", () => {
    expect(parseCitationResponse('{"sources": ["SOURCE_1"]}').ok).toBe(false);
    expect(parseCitationResponse('{"cited_sources": "SOURCE_1"}').ok).toBe(false);
    expect(parseCitationResponse("null").ok).toBe(false);
  });
});

describe("resolveCitedIndices", () => {
  it("maps labels to context order and ignores anything malformed", () => {
    expect(
      resolveCitedIndices(
        ["SOURCE_3", "source_1", "SOURCE_1", " SOURCE_2 ", "SOURCE_9", "SOURCE_0", "3"],
        3
      )
    ).toEqual([0, 1, 2]);
  });

  it("skips entries that are not strings", () => {
    expect(resolveCitedIndices(["SOURCE_1", 2, null, { id: "SOURCE_2" }], 3)).toEqual([
      0,
    ]);
  });

  it("collapses repeated labels", () => {
    expect(resolveCitedIndices(["SOURCE_2", "SOURCE_2"], 3)).toEqual([1]);
  });
});

describe("buildCitationPrompt", () => {
  it("labels each source in context order", () => {
    const prompt = buildCitationPrompt("Revenue was $5M.", context);

    expect(prompt).toContain("<SOURCE_1>\nRevenue was $5M in 2023.\n</SOURCE_1>");
    expect(prompt).toContain(
      "<SOURCE_3>\nSummary of an image from page 2: a chart of revenue by year\n</SOURCE_3>"
    );
    expect(prompt).toContain("**Generated Answer**:\nRevenue was $5M.\n");
  });
});

describe("CitationVerifier", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the verified indices from a deterministic JSON call", async () => {
    const generator = new FakeGenerator(() =>
      JSON.stringify({ cited_sources: ["SOURCE_3", "SOURCE_1"] })
    );

    const cited = await new CitationVerifier(generator).verify(
      "Revenue was $5M.",
      context
    );

    expect(cited).toEqual([0, 2]);
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0]).toMatchObject({ temperature: 0, format: "json" });
  });

  it("cites nothing when the response is malformed", async () => {
    const generator = new FakeGenerator(
      () => "Sure! The answer is supported by SOURCE_1."
    );

    expect(await new CitationVerifier(generator).verify("answer", context)).toEqual(
      []
    );
  });

  it("cites nothing when the verification call fails", async () => {
    const generator = new FakeGenerator(() => {
      throw new Error("model unavailable");
    });

    await expect(
      new CitationVerifier(generator).verify("answer", context)
    ).resolves.toEqual([]);
  });

  it("keeps valid labels when other entries have the wrong type", async () => {
    const generator = new FakeGenerator(() => '{"cited_sources": ["SOURCE_1", 2]}');

    expect(
      await new CitationVerifier(generator).verify("answer", context.slice(0, 2))
    ).toEqual([0]);
  });

  it("accepts an explicit empty list", async () => {
    const generator = new FakeGenerator(() => '{"cited_sources": []}');

    expect(await new CitationVerifier(generator).verify("answer", context)).toEqual(
      []
    );
  });

  it("does not call the model without context", async () => {
    const generator = new FakeGenerator();

    expect(await new CitationVerifier(generator).verify("answer", [])).toEqual([]);
    expect(generator.requests).toHaveLength(0);
  });
});
