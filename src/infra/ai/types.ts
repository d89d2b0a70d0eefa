import { AnswerMode } from "../../config/env.js";

export interface GenerationContext {
  texts: string[];
  /** Base64 image payloads attached inline to the prompt. */
  images: string[];
}

export interface EmbeddingClient {
  isEmbeddingConfigured(): boolean;
  embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  embedQuery(query: string, signal?: AbortSignal): Promise<number[]>;
}

export interface AnswerGenerator {
  getAnswerMode(): AnswerMode;
  generateAnswer(
    question: string,
    context: GenerationContext,
    signal?: AbortSignal,
  ): Promise<string | null>;
}

export interface AiClient extends EmbeddingClient, AnswerGenerator {}
