import { DocumentStore } from "../domain/documentStore.js";
import { SummaryHit, SummaryIndex } from "../domain/summaryIndex.js";
import {
  Corpus,
  ImageContext,
  RetrievalContext,
  TextExcerpt,
} from "../domain/types.js";
import { raceAbort } from "../utils/abort.js";
import { describeError, logger } from "../utils/logger.js";
import { dedupe } from "../utils/text.js";
import { buildKeywordExcerpts, buildKeywordImageHits } from "./keywordRanker.js";

export interface HybridRetrieverOptions {
  textFallbackCount: number;
  imageFallbackCount: number;
}

export interface RetrieveOptions {
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: HybridRetrieverOptions = {
  textFallbackCount: 5,
  imageFallbackCount: 4,
};

export class HybridRetriever {
  private readonly options: HybridRetrieverOptions;

  constructor(
    private readonly summaryIndex: SummaryIndex,
    private readonly documentStore: DocumentStore,
    private readonly corpus: Corpus,
    options?: Partial<HybridRetrieverOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async retrieve(
    query: string,
    k: number,
    options?: RetrieveOptions,
  ): Promise<RetrievalContext> {
    const hits = await this.queryIndex(query, k, options?.signal);
    const ids = dedupe(hits.map((hit) => hit.id));
    const resolved = ids.length > 0 ? await this.documentStore.getMany(ids) : [];

    const texts: string[] = [];
    const images: ImageContext[] = [];
    let misses = 0;

    for (const item of resolved) {
      if (!item) {
        misses += 1;
        continue;
      }
      switch (item.kind) {
        case "text":
        case "table":
          texts.push(item.text);
          break;
        case "image":
          images.push({ data: item.data, caption: item.caption });
          break;
      }
    }

    if (misses > 0) {
      logger.warn("Summary hits did not resolve in the document store", { misses });
    }

    const context: RetrievalContext = {
      texts,
      images,
      origin: { texts: "vector", images: "vector" },
    };

    if (context.texts.length === 0) {
      context.texts = this.keywordTextFallback(query).map((excerpt) => excerpt.text);
      context.origin.texts = "keyword";
    }

    if (context.images.length === 0) {
      context.images = this.keywordImageFallback(query);
      context.origin.images = "keyword";
    }

    logger.debug("Retrieval finished", {
      k,
      vector_hits: hits.length,
      texts: context.texts.length,
      images: context.images.length,
      origin: context.origin,
    });

    return context;
  }

  keywordTextFallback(query: string): TextExcerpt[] {
    const { textSummaries, texts } = this.corpus.pools;
    const pool = textSummaries.length > 0 ? textSummaries : texts;
    return buildKeywordExcerpts(query, pool, this.options.textFallbackCount);
  }

  keywordImageFallback(query: string): ImageContext[] {
    const pool = this.corpus.pools.images;
    return buildKeywordImageHits(
      query,
      pool.map((image) => image.data),
      pool.map((image) => image.caption),
      this.options.imageFallbackCount,
    ).map((hit) => ({ data: hit.data, caption: hit.summary }));
  }

  private async queryIndex(
    query: string,
    k: number,
    signal?: AbortSignal,
  ): Promise<SummaryHit[]> {
    try {
      return await raceAbort(this.summaryIndex.query(query, k, signal), signal);
    } catch (error) {
      logger.warn("Summary index unavailable; using keyword fallback", {
        error: describeError(error),
        aborted: signal?.aborted ?? false,
      });
      return [];
    }
  }
}
