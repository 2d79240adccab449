import { Ollama, type Message } from "ollama";

import { getErrorMessage } from "../errors";
import type {
  EmbeddingService,
  GenerationRequest,
  GenerationService,
} from "../types/services";

type GatewayConfig = {
  host: string;
  llmModel: string;
  embeddingModel: string;
  keepAlive?: string;
  contextWindow?: number;
};

export class OllamaGateway implements EmbeddingService, GenerationService {
  private readonly client: Ollama;

  constructor(private readonly config: GatewayConfig) {
    this.client = new Ollama({ host: config.host });
  }

  async embed(text: string): Promise<number[]> {
    if (!text.trim()) {
      return [];
    }

    try {
      const response = await this.client.embeddings({
        model: this.config.embeddingModel,
        prompt: text,
      });

      if (!response.embedding?.length) {
        throw new Error(
          "Embedding vector is empty. Is the model loaded in Ollama?"
        );
      }

      return response.embedding;
    } catch (error) {
      throw new Error(
        `Failed to create embedding via Ollama (${
          this.config.embeddingModel
        }) at ${this.config.host}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async generate({
    prompt,
    images,
    temperature = 0.1,
    format,
  }: GenerationRequest): Promise<string> {
    const message: Message = { role: "user", content: prompt };

    if (images?.length) {
      message.images = images;
    }

    try {
      const response = await this.client.chat({
        model: this.config.llmModel,
        messages: [message],
        stream: false,
        format,
        keep_alive: this.config.keepAlive ?? "5m",
        options: {
          temperature,
          num_ctx: this.config.contextWindow ?? 8192,
        },
      });

      return response.message.content.trim();
    } catch (error) {
      throw new Error(
        `Failed to generate a response via Ollama (${
          this.config.llmModel
        }) at ${this.config.host}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
