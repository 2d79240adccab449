import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { ContentSummarizer, IMAGE_SUMMARY_FALLBACK } from "../contentSummarizer";
import { FakeGenerator } from "../../__tests__/fakes";

const failing = () =>
  new FakeGenerator(() => {
    throw new Error("connection refused");
  });

describe("ContentSummarizer", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("describes images deterministically with the image attached", async () => {
    const generator = new FakeGenerator(() => "A red square");

    expect(
      await new ContentSummarizer(generator).summarizeImage(new Uint8Array([1, 2, 3]))
    ).toBe("A red square");
    expect(generator.requests[0]).toMatchObject({
      images: ["AQID"],
      temperature: 0,
    });
  });

  it("calls the model once per request without caching", async () => {
    const generator = new FakeGenerator(() => "same");
    const summarizer = new ContentSummarizer(generator);
    const image = new Uint8Array([5]);

    await summarizer.summarizeImage(image);
    await summarizer.summarizeImage(image);

    expect(generator.requests).toHaveLength(2);
  });

  it("falls back to fixed text when image description fails", async () => {
    expect(
      await new ContentSummarizer(failing()).summarizeImage(new Uint8Array([1]))
    ).toBe(IMAGE_SUMMARY_FALLBACK);
  });

  it("embeds the failure in the formula summary", async () => {
    expect(
      await new ContentSummarizer(failing()).summarizeFormula(new Uint8Array([1]))
    ).toBe("Error generating formula summary: connection refused");
  });

  it("returns an empty query-image description on failure", async () => {
    expect(
      await new ContentSummarizer(failing()).describeQueryImage(new Uint8Array([1]))
    ).toBe("");
  });
});
