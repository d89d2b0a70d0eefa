import { z } from "zod";
import { CollaboratorUnavailableError } from "../../domain/errors.js";
import { ANSWER_SYSTEM_PROMPT, buildAnswerPrompt } from "./prompts.js";
import { GenerationContext } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

const embeddingResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index], signal);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const payload = await this.post(
      "/api/embeddings",
      { model: this.options.embeddingModel, prompt: query },
      "embeddings",
      signal,
    );

    const data = embeddingResponseSchema.parse(payload);
    if (!data.embedding || data.embedding.length === 0) {
      throw new CollaboratorUnavailableError("embeddings", "Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async generateAnswer(
    question: string,
    context: GenerationContext,
    signal?: AbortSignal,
  ): Promise<string | null> {
    const payload = await this.post(
      "/api/chat",
      {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.1,
          num_predict: 320,
          top_p: 0.9,
        },
        messages: [
          { role: "system", content: ANSWER_SYSTEM_PROMPT },
          {
            role: "user",
            content: buildAnswerPrompt(question, context),
            images: context.images,
          },
        ],
      },
      "answer_generator",
      signal,
    );

    const data = chatResponseSchema.parse(payload);
    return data.message?.content?.trim() || null;
  }

  private async post(
    endpoint: string,
    body: unknown,
    collaborator: "embeddings" | "answer_generator",
    signal?: AbortSignal,
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.options.baseUrl}${endpoint}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new CollaboratorUnavailableError(collaborator, `Ollama ${endpoint} request failed.`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new CollaboratorUnavailableError(
        collaborator,
        `Ollama ${endpoint} failed (${response.status}): ${await response.text()}`,
      );
    }
    return response.json();
  }
}
