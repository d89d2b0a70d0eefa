import { z } from "zod";
import { CollaboratorUnavailableError } from "../../domain/errors.js";
import { ANSWER_SYSTEM_PROMPT, buildAnswerPrompt } from "./prompts.js";
import { GenerationContext } from "./types.js";

const OPENAI_BASE_URL = "https://api.openai.com/v1";

interface OpenAiClientOptions {
  apiKey: string | null;
  embeddingModel: string;
  chatModel: string;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export class OpenAiClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const payload = await this.post(
      "/embeddings",
      { model: this.options.embeddingModel, input: texts },
      "embeddings",
      signal,
    );
    const data = embeddingResponseSchema.parse(payload);
    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedTexts([query], signal);
    if (!embedding) {
      throw new CollaboratorUnavailableError("embeddings", "OpenAI returned no query embedding.");
    }
    return embedding;
  }

  async generateAnswer(
    question: string,
    context: GenerationContext,
    signal?: AbortSignal,
  ): Promise<string | null> {
    const content: ChatContentPart[] = [
      { type: "text", text: buildAnswerPrompt(question, context) },
      ...context.images.map(
        (data): ChatContentPart => ({
          type: "image_url",
          image_url: { url: `data:image/jpeg;base64,${data}` },
        }),
      ),
    ];

    const payload = await this.post(
      "/chat/completions",
      {
        model: this.options.chatModel,
        temperature: 0,
        messages: [
          { role: "system", content: ANSWER_SYSTEM_PROMPT },
          { role: "user", content },
        ],
      },
      "answer_generator",
      signal,
    );
    const data = chatResponseSchema.parse(payload);
    return data.choices[0]?.message.content?.trim() || null;
  }

  private async post(
    endpoint: string,
    body: unknown,
    collaborator: "embeddings" | "answer_generator",
    signal?: AbortSignal,
  ): Promise<unknown> {
    const apiKey = this.requireApiKey();

    let response: Response;
    try {
      response = await fetch(`${OPENAI_BASE_URL}${endpoint}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new CollaboratorUnavailableError(collaborator, `OpenAI ${endpoint} request failed.`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new CollaboratorUnavailableError(
        collaborator,
        `OpenAI ${endpoint} failed (${response.status}): ${await response.text()}`,
      );
    }
    return response.json();
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
