import { GuardReason, validateQuery } from "../guards/queryGuard.js";
import { AnswerGenerator, GenerationContext } from "../infra/ai/types.js";
import {
  ContextOrigin,
  ImageHit,
  RetrievalContext,
  TextExcerpt,
} from "../domain/types.js";
import { buildContextDigest } from "../pipelines/answering.js";
import { bulletize, formatImageCaption, tighten } from "../pipelines/formatting.js";
import { buildReferences, referencesFromExcerpts } from "../pipelines/references.js";
import { HybridRetriever } from "../retrieval/hybridRetriever.js";
import { planK } from "../retrieval/queryPlanner.js";
import { safetyNotes } from "../rules/safetyNotes.js";
import { raceAbort } from "../utils/abort.js";
import { describeError, logger } from "../utils/logger.js";
import { stripHighlight } from "../utils/text.js";

export type AnswerGenerationMode = "none" | "deterministic" | "openai" | "ollama";

export interface QuestionAnswerResult {
  answer_text: string;
  references: string[];
  context_texts: TextExcerpt[];
  context_images: ImageHit[];
  answer_generation_mode: AnswerGenerationMode;
  retrieval_origin: { texts: ContextOrigin; images: ContextOrigin } | null;
  k: number;
  guard_rejection?: GuardReason;
  latency_ms: number;
}

export interface SearchContextResult {
  query: string;
  k: number;
  retrieval_origin: { texts: ContextOrigin; images: ContextOrigin } | null;
  context_texts: TextExcerpt[];
  context_images: ImageHit[];
  guard_rejection?: GuardReason;
  message?: string;
}

export interface QuestionAnswerServiceOptions {
  kInitial: number;
  kExpand: number;
  maxReferences: number;
  indexTimeoutMs: number;
  answerTimeoutMs: number;
}

const DEFAULT_OPTIONS: QuestionAnswerServiceOptions = {
  kInitial: 6,
  kExpand: 10,
  maxReferences: 8,
  indexTimeoutMs: 10_000,
  answerTimeoutMs: 60_000,
};

const CONTEXT_TEXT_LINE_WIDTH = 90;
const CONTEXT_CAPTION_WIDTH = 120;
const PLACEHOLDER_PAGE = "N/A";

export class QuestionAnswerService {
  private readonly options: QuestionAnswerServiceOptions;

  constructor(
    private readonly retriever: HybridRetriever,
    private readonly generator: AnswerGenerator,
    options?: Partial<QuestionAnswerServiceOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async handleQuery(question: string): Promise<QuestionAnswerResult> {
    const startedAt = Date.now();
    const trimmed = question.trim();

    const guard = validateQuery(trimmed);
    if (!guard.ok) {
      logger.info("Question rejected by guard", { reason: guard.reason });
      return {
        answer_text: guard.message,
        references: [],
        context_texts: [],
        context_images: [],
        answer_generation_mode: "none",
        retrieval_origin: null,
        k: 0,
        guard_rejection: guard.reason,
        latency_ms: Date.now() - startedAt,
      };
    }

    const k = planK(trimmed, this.options);
    const context = await this.retrieve(trimmed, k);
    const generated = await this.generate(trimmed, context);

    let rawAnswer = generated.text;
    const notes = safetyNotes(trimmed);
    if (notes) {
      rawAnswer += `\n\n- Safety note: ${notes}`;
    }

    const contextTexts = toDisplayTexts(context);
    const contextImages = toDisplayImages(context);

    let references = buildReferences(
      {
        texts: context.origin.texts === "vector" ? context.texts : [],
        images: context.origin.images === "vector" ? context.images : [],
      },
      this.options.maxReferences,
    );
    if (references.length === 0) {
      references = referencesFromExcerpts(contextTexts, this.options.maxReferences);
    }

    return {
      answer_text: tighten(rawAnswer, 120),
      references,
      context_texts: contextTexts,
      context_images: contextImages,
      answer_generation_mode: generated.mode,
      retrieval_origin: context.origin,
      k,
      latency_ms: Date.now() - startedAt,
    };
  }

  async searchContext(query: string, topK?: number): Promise<SearchContextResult> {
    const trimmed = query.trim();

    const guard = validateQuery(trimmed);
    if (!guard.ok) {
      logger.info("Search rejected by guard", { reason: guard.reason });
      return {
        query: trimmed,
        k: 0,
        retrieval_origin: null,
        context_texts: [],
        context_images: [],
        guard_rejection: guard.reason,
        message: guard.message,
      };
    }

    const k = topK ?? planK(trimmed, this.options);
    const context = await this.retrieve(trimmed, k);

    return {
      query: trimmed,
      k,
      retrieval_origin: context.origin,
      context_texts: toDisplayTexts(context),
      context_images: toDisplayImages(context),
    };
  }

  private retrieve(query: string, k: number): Promise<RetrievalContext> {
    return this.retriever.retrieve(query, k, {
      signal: AbortSignal.timeout(this.options.indexTimeoutMs),
    });
  }

  private async generate(
    question: string,
    context: RetrievalContext,
  ): Promise<{ text: string; mode: AnswerGenerationMode }> {
    const mode = this.generator.getAnswerMode();

    if (mode !== "client_llm") {
      const signal = AbortSignal.timeout(this.options.answerTimeoutMs);
      try {
        const text = await raceAbort(
          this.generator.generateAnswer(question, toGenerationContext(context), signal),
          signal,
        );
        if (text) {
          return { text, mode };
        }
      } catch (error) {
        logger.warn("Answer generator unavailable; using context digest", {
          mode,
          error: describeError(error),
        });
      }
    }

    return { text: buildContextDigest(question, context), mode: "deterministic" };
  }
}

// Keyword-matched images are a best-effort guess, so only vector hits go to the model.
function toGenerationContext(context: RetrievalContext): GenerationContext {
  return {
    texts: context.texts.map(stripHighlight),
    images: context.origin.images === "vector" ? context.images.map((image) => image.data) : [],
  };
}

function toDisplayTexts(context: RetrievalContext): TextExcerpt[] {
  if (context.origin.texts === "keyword") {
    return context.texts.map((text) => ({ text, page_number: PLACEHOLDER_PAGE }));
  }
  return context.texts.map((text) => ({
    text: bulletize(text, CONTEXT_TEXT_LINE_WIDTH),
    page_number: PLACEHOLDER_PAGE,
  }));
}

function toDisplayImages(context: RetrievalContext): ImageHit[] {
  if (context.origin.images === "keyword") {
    return context.images.map((image) => ({ data: image.data, summary: image.caption }));
  }
  return context.images.map((image) => ({
    data: image.data,
    summary: formatImageCaption(image.caption, CONTEXT_CAPTION_WIDTH),
  }));
}
