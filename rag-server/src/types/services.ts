export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

export type GenerationRequest = {
  prompt: string;
  /** Base64-encoded images sent alongside the prompt. */
  images?: string[];
  temperature?: number;
  format?: "json";
};

export interface GenerationService {
  generate(request: GenerationRequest): Promise<string>;
}
