import { SummaryHit, SummaryIndex, SummaryIndexStats } from "../../domain/summaryIndex.js";
import { SummaryEntry } from "../../domain/types.js";
import { describeError, logger } from "../../utils/logger.js";
import { cosineSimilarity } from "../../utils/vector.js";
import { EmbeddingClient } from "../ai/types.js";

interface IndexedSummary {
  entry: SummaryEntry;
  embedding: number[] | null;
}

export interface InMemorySummaryIndexOptions {
  batchSize: number;
}

const DEFAULT_OPTIONS: InMemorySummaryIndexOptions = {
  batchSize: 64,
};

export class InMemorySummaryIndex implements SummaryIndex {
  private readonly rows: IndexedSummary[] = [];

  private readonly knownIds = new Set<string>();

  private readonly options: InMemorySummaryIndexOptions;

  constructor(
    private readonly embeddings: EmbeddingClient,
    options?: Partial<InMemorySummaryIndexOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async addEntries(entries: readonly SummaryEntry[]): Promise<void> {
    const fresh = entries.filter((entry) => !this.knownIds.has(entry.id));
    if (fresh.length === 0) {
      return;
    }

    const embeddingEnabled = this.embeddings.isEmbeddingConfigured();
    for (let start = 0; start < fresh.length; start += this.options.batchSize) {
      const batch = fresh.slice(start, start + this.options.batchSize);
      const vectors = embeddingEnabled ? await this.embedBatch(batch) : [];

      batch.forEach((entry, offset) => {
        this.knownIds.add(entry.id);
        this.rows.push({ entry, embedding: vectors[offset] ?? null });
      });
    }

    logger.info("Summary entries indexed", {
      added: fresh.length,
      embedding_enabled: embeddingEnabled,
    });
  }

  async query(text: string, k: number, signal?: AbortSignal): Promise<SummaryHit[]> {
    if (!this.embeddings.isEmbeddingConfigured() || k <= 0) {
      return [];
    }

    const embedded = this.rows.filter(
      (row): row is { entry: SummaryEntry; embedding: number[] } => row.embedding !== null,
    );
    if (embedded.length === 0) {
      return [];
    }

    const queryEmbedding = await this.embeddings.embedQuery(text, signal);
    return embedded
      .map((row) => ({
        entry: row.entry,
        score: cosineSimilarity(queryEmbedding, row.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
      .map(({ entry }) => ({ id: entry.id, modality: entry.modality }));
  }

  async stats(): Promise<SummaryIndexStats> {
    return {
      entries: this.rows.length,
      embedded: this.rows.filter((row) => row.embedding !== null).length,
    };
  }

  private async embedBatch(batch: SummaryEntry[]): Promise<number[][]> {
    try {
      const vectors = await this.embeddings.embedTexts(batch.map((entry) => entry.summary));
      if (vectors.length !== batch.length) {
        throw new Error(
          `Embedding count mismatch (${vectors.length} for ${batch.length} summaries).`,
        );
      }
      return vectors;
    } catch (error) {
      // Entries stay queryable through the keyword fallback.
      logger.warn("Summary embedding failed; batch indexed without vectors", {
        batch_size: batch.length,
        error: describeError(error),
      });
      return [];
    }
  }
}
