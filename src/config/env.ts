import { z } from "zod";
import { LogLevelName } from "../utils/logger.js";

const envSchema = z.object({
  CORPUS_DIR: z.string().default("./data_cache"),
  RETRIEVAL_K_INITIAL: z.coerce.number().int().positive().default(6),
  RETRIEVAL_K_EXPAND: z.coerce.number().int().positive().default(10),
  FALLBACK_TEXT_COUNT: z.coerce.number().int().positive().default(5),
  FALLBACK_IMAGE_COUNT: z.coerce.number().int().positive().default(4),
  MAX_REFERENCES: z.coerce.number().int().positive().default(8),
  INDEX_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ANSWER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-large"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  ANSWER_MODE: z.enum(["client_llm", "openai", "ollama"]).default("client_llm"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("llava:7b"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
});

export type EmbeddingProvider = "none" | "openai" | "ollama";
export type AnswerMode = "client_llm" | "openai" | "ollama";

export interface AppConfig {
  corpusDir: string;
  kInitial: number;
  kExpand: number;
  fallbackTextCount: number;
  fallbackImageCount: number;
  maxReferences: number;
  indexTimeoutMs: number;
  answerTimeoutMs: number;
  openaiApiKey: string | null;
  openaiEmbeddingModel: string;
  openaiChatModel: string;
  embeddingProvider: EmbeddingProvider;
  answerMode: AnswerMode;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: LogLevelName;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.RETRIEVAL_K_EXPAND < parsed.RETRIEVAL_K_INITIAL) {
    throw new Error("RETRIEVAL_K_EXPAND must be >= RETRIEVAL_K_INITIAL.");
  }

  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;
  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (openaiApiKey ? "openai" : "none");

  if (
    !openaiApiKey &&
    (embeddingProvider === "openai" || parsed.ANSWER_MODE === "openai")
  ) {
    throw new Error("OpenAI embeddings or answers require OPENAI_API_KEY.");
  }

  return {
    corpusDir: parsed.CORPUS_DIR,
    kInitial: parsed.RETRIEVAL_K_INITIAL,
    kExpand: parsed.RETRIEVAL_K_EXPAND,
    fallbackTextCount: parsed.FALLBACK_TEXT_COUNT,
    fallbackImageCount: parsed.FALLBACK_IMAGE_COUNT,
    maxReferences: parsed.MAX_REFERENCES,
    indexTimeoutMs: parsed.INDEX_TIMEOUT_MS,
    answerTimeoutMs: parsed.ANSWER_TIMEOUT_MS,
    openaiApiKey,
    openaiEmbeddingModel: normalizeModelId(parsed.OPENAI_EMBEDDING_MODEL),
    openaiChatModel: normalizeModelId(parsed.OPENAI_CHAT_MODEL),
    embeddingProvider,
    answerMode: parsed.ANSWER_MODE,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}

// Accepts both "text-embedding-3-large" and "openai/text-embedding-3-large".
function normalizeModelId(modelId: string): string {
  const slash = modelId.indexOf("/");
  return slash >= 0 ? modelId.slice(slash + 1) : modelId;
}
