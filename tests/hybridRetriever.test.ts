import { describe, expect, it } from "vitest";
import { InMemoryDocumentStore } from "../src/infra/store/inMemoryDocumentStore.js";
import { HybridRetriever } from "../src/retrieval/hybridRetriever.js";
import { SummaryHit } from "../src/domain/summaryIndex.js";
import { IMAGE_DATA, createStubIndex, createTestCorpus } from "./helpers.js";

function createRetriever(result: SummaryHit[] | Error | "pending", corpus = createTestCorpus()) {
  const { index, query } = createStubIndex(result);
  const retriever = new HybridRetriever(index, InMemoryDocumentStore.fromCorpus(corpus), corpus);
  return { retriever, query };
}

describe("HybridRetriever", () => {
  it("partitions vector hits by modality and ignores unknown ids", async () => {
    const { retriever, query } = createRetriever([
      { id: "tb1", modality: "table" },
      { id: "missing", modality: "text" },
      { id: "t1", modality: "text" },
      { id: "im1", modality: "image" },
      { id: "t1", modality: "text" },
    ]);

    const context = await retriever.retrieve("sodium", 4);

    expect(query).toHaveBeenCalledWith("sodium", 4, undefined);
    expect(context).toEqual({
      texts: ["Nutrient | mg\nSodium | 2000", "Sodium guidance text."],
      images: [{ data: IMAGE_DATA, caption: "Sodium chart" }],
      origin: { texts: "vector", images: "vector" },
    });
  });

  it("falls back to keyword texts when only images are retrieved", async () => {
    const { retriever } = createRetriever([{ id: "im1", modality: "image" }]);

    const context = await retriever.retrieve("sodium limits", 6);

    expect(context.texts).toEqual(["Summary about <mark>sodium</mark> <mark>limits</mark>."]);
    expect(context.origin).toEqual({ texts: "keyword", images: "vector" });
  });

  it("falls back to keyword images when only texts are retrieved", async () => {
    const { retriever } = createRetriever([{ id: "t1", modality: "text" }]);

    const context = await retriever.retrieve("potassium", 6);

    expect(context.texts).toEqual(["Sodium guidance text."]);
    expect(context.images).toEqual([{ data: IMAGE_DATA, caption: "Sodium chart" }]);
    expect(context.origin).toEqual({ texts: "vector", images: "keyword" });
  });

  it("uses both fallbacks when the index fails", async () => {
    const { retriever } = createRetriever(new Error("index offline"));

    const context = await retriever.retrieve("potassium", 6);

    expect(context).toEqual({
      texts: ["Summary about <mark>potassium</mark> foods."],
      images: [{ data: IMAGE_DATA, caption: "Sodium chart" }],
      origin: { texts: "keyword", images: "keyword" },
    });
  });

  it("stops waiting for the index once the signal aborts", async () => {
    const { retriever } = createRetriever("pending");

    const context = await retriever.retrieve("sodium", 6, { signal: AbortSignal.abort() });

    expect(context.origin).toEqual({ texts: "keyword", images: "keyword" });
    expect(context.images).toEqual([{ data: IMAGE_DATA, caption: "<mark>Sodium</mark> chart" }]);
  });

  it("ranks raw texts when no text summaries exist", async () => {
    const { retriever } = createRetriever([], createTestCorpus({ textSummaries: [] }));

    const context = await retriever.retrieve("potassium", 6);

    expect(context.texts).toEqual(["Raw <mark>potassium</mark> passage"]);
  });

  it("returns no texts for a query without usable terms", async () => {
    const { retriever } = createRetriever([]);

    const context = await retriever.retrieve("??", 6);

    expect(context.texts).toEqual([]);
    expect(context.images).toEqual([{ data: IMAGE_DATA, caption: "Sodium chart" }]);
  });
});
