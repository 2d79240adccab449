import { z } from "zod";

import { getErrorMessage } from "../errors";
import type { StoredChunk } from "../types/knowledge";
import type { GenerationService } from "../types/services";
import { displayText } from "./answerSynthesizer";

const citationResponseSchema = z.object({
  cited_sources: z.array(z.unknown()),
});

const JSON_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

const SOURCE_LABEL = /^SOURCE_(\d+)$/;

export type CitationParseResult =
  | { ok: true; labels: unknown[] }
  | { ok: false; reason: string };

export const sourceLabel = (index: number) => `SOURCE_${index + 1}`;

export const buildCitationPrompt = (answer: string, context: StoredChunk[]) => {
  const sources = context
    .map((chunk, index) => {
      const label = sourceLabel(index);
      return `<${label}>\n${displayText(chunk)}\n</${label}>`;
    })
    .join("\n\n");

  return `You are a highly analytical and skeptical citation-finding assistant. Your ONLY job is to determine which of the provided sources were *actually used* to create the given answer.

You must follow these STRICT rules:
1. Compare the "Generated Answer" against each "Source" provided below.
2. Identify ONLY the sources that contain the EXACT information, facts, or data points present in the answer.
3. Do NOT cite a source just because it shares some keywords with the answer. The source must SEMANTICALLY support the claims in the answer.
4. If the answer makes a specific claim (e.g., "Revenue was $5M"), the source MUST contain that exact fact.
5. It is better to return an empty list than to cite an irrelevant source.
6. Respond with a JSON object containing a single key "cited_sources" whose value is a list of source IDs, e.g. {"cited_sources": ["SOURCE_1", "SOURCE_3"]}.
7. If no source directly supports the answer, return {"cited_sources": []}.
8. Do not add any explanation or text outside of the JSON object.
---
**Generated Answer**:
${answer}
---
**Available Sources**:
${sources}
---
**Your JSON Response**:`;
};

export const parseCitationResponse = (raw: string): CitationParseResult => {
  let parsed: unknown;

  try {
    const trimmed = raw.trim();
    parsed = JSON.parse(JSON_FENCE.exec(trimmed)?.[1] ?? trimmed);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${getErrorMessage(error)}` };
  }

  const result = citationResponseSchema.safeParse(parsed);

  if (!result.success) {
    return { ok: false, reason: result.error.message };
  }

  return { ok: true, labels: result.data.cited_sources };
};

/**
 * Maps labels back to 0-based context indices in context order. Entries that
 * are not strings, malformed or out of range are ignored.
 */
export const resolveCitedIndices = (
  labels: unknown[],
  contextSize: number
): number[] => {
  const cited = new Set<number>();

  for (const label of labels) {
    if (typeof label !== "string") {
      continue;
    }

    const match = SOURCE_LABEL.exec(label.trim());

    if (!match) {
      continue;
    }

    const index = Number(match[1]) - 1;

    if (index >= 0 && index < contextSize) {
      cited.add(index);
    }
  }

  return Array.from(cited).sort((a, b) => a - b);
};

export class CitationVerifier {
  constructor(private readonly generator: GenerationService) {}

  /** Never throws: any failure means nothing is cited. */
  async verify(answer: string, context: StoredChunk[]): Promise<number[]> {
    if (!context.length) {
      return [];
    }

    let raw: string;

    try {
      raw = await this.generator.generate({
        prompt: buildCitationPrompt(answer, context),
        temperature: 0,
        format: "json",
      });
    } catch (error) {
      console.warn(
        `Citation check failed; returning no sources: ${getErrorMessage(error)}`
      );
      return [];
    }

    const parsed = parseCitationResponse(raw);

    if (!parsed.ok) {
      console.warn(
        `Citation response unusable; returning no sources: ${parsed.reason}`
      );
      return [];
    }

    return resolveCitedIndices(parsed.labels, context.length);
  }
}
