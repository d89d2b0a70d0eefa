import { AnswerMode, AppConfig, EmbeddingProvider } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { AiClient, GenerationContext } from "./types.js";

export type AiClientConfig = Pick<
  AppConfig,
  | "openaiApiKey"
  | "openaiEmbeddingModel"
  | "openaiChatModel"
  | "embeddingProvider"
  | "answerMode"
  | "ollamaBaseUrl"
  | "ollamaChatModel"
  | "ollamaEmbeddingModel"
>;

export class DefaultAiClient implements AiClient {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly embeddingProvider: EmbeddingProvider;

  private readonly answerMode: AnswerMode;

  constructor(config: AiClientConfig) {
    this.openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      embeddingModel: config.openaiEmbeddingModel,
      chatModel: config.openaiChatModel,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
    });
    this.embeddingProvider = config.embeddingProvider;
    this.answerMode = config.answerMode;
  }

  isEmbeddingConfigured(): boolean {
    if (this.embeddingProvider === "none") {
      return false;
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.isConfigured();
    }
    return true;
  }

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0 || this.embeddingProvider === "none") {
      return [];
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedTexts(texts, signal);
    }
    return this.ollama.embedTexts(texts, signal);
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    if (this.embeddingProvider === "none") {
      throw new Error("Embedding provider is disabled.");
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.embedQuery(query, signal);
    }
    return this.ollama.embedQuery(query, signal);
  }

  getAnswerMode(): AnswerMode {
    return this.answerMode;
  }

  async generateAnswer(
    question: string,
    context: GenerationContext,
    signal?: AbortSignal,
  ): Promise<string | null> {
    if (this.answerMode === "openai") {
      return this.openAi.generateAnswer(question, context, signal);
    }
    if (this.answerMode === "ollama") {
      return this.ollama.generateAnswer(question, context, signal);
    }
    return null;
  }
}
