import { getErrorMessage } from "../errors";
import type { GenerationService } from "../types/services";

const IMAGE_INSTRUCTION =
  "Provide a detailed description of this image. If it contains charts, graphs, or tables, extract the key information and data. Describe the main subject, any visible text and the important context.";

const FORMULA_INSTRUCTION =
  "This image contains a mathematical or chemical formula. Transcribe it into a standard textual representation like LaTeX or a simple plain text description. For example, for an image of x squared, return 'x^2'.";

const QUERY_IMAGE_INSTRUCTION =
  "Describe this image in detail. Focus on key objects, text, charts, and the overall context. This description will be used to find relevant information in a database.";

export const IMAGE_SUMMARY_FALLBACK =
  "No summary could be generated for this image.";

export const toBase64 = (bytes: Uint8Array) =>
  Buffer.from(bytes).toString("base64");

/**
 * Turns image-like content into text that can be embedded and shown as a
 * citation. Every method is best-effort: failures become fallback text.
 */
export class ContentSummarizer {
  constructor(private readonly generator: GenerationService) {}

  async summarizeImage(image: Uint8Array): Promise<string> {
    try {
      return await this.describe(image, IMAGE_INSTRUCTION, 0);
    } catch (error) {
      console.warn(`Image summary failed: ${getErrorMessage(error)}`);
      return IMAGE_SUMMARY_FALLBACK;
    }
  }

  async summarizeFormula(image: Uint8Array): Promise<string> {
    try {
      return await this.describe(image, FORMULA_INSTRUCTION, 0);
    } catch (error) {
      console.warn(`Formula summary failed: ${getErrorMessage(error)}`);
      return `Error generating formula summary: ${getErrorMessage(error)}`;
    }
  }

  /** Empty string on failure so nothing is appended to the search query. */
  async describeQueryImage(image: Uint8Array): Promise<string> {
    try {
      return await this.describe(image, QUERY_IMAGE_INSTRUCTION, 0.1);
    } catch (error) {
      console.warn(`Query image analysis failed: ${getErrorMessage(error)}`);
      return "";
    }
  }

  private describe(image: Uint8Array, prompt: string, temperature: number) {
    return this.generator.generate({
      prompt,
      images: [toBase64(image)],
      temperature,
    });
  }
}
