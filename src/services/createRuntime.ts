import { AppConfig } from "../config/env.js";
import { LoadError } from "../domain/errors.js";
import { DocumentStore } from "../domain/documentStore.js";
import { SummaryIndex } from "../domain/summaryIndex.js";
import { Corpus } from "../domain/types.js";
import { DefaultAiClient } from "../infra/ai/defaultAiClient.js";
import { AiClient } from "../infra/ai/types.js";
import { CorpusBuildReport, buildCorpus } from "../infra/corpus/corpusBuilder.js";
import { loadCorpusArtifacts } from "../infra/corpus/corpusLoader.js";
import { InMemorySummaryIndex } from "../infra/index/inMemorySummaryIndex.js";
import { InMemoryDocumentStore } from "../infra/store/inMemoryDocumentStore.js";
import { HybridRetriever } from "../retrieval/hybridRetriever.js";
import { QuestionAnswerService } from "./questionAnswerService.js";

export interface Runtime {
  service: QuestionAnswerService;
  corpus: Corpus;
  documentStore: DocumentStore;
  summaryIndex: SummaryIndex;
  report: CorpusBuildReport;
  loadErrors: LoadError[];
}

export async function createRuntime(
  config: AppConfig,
  aiClient: AiClient = new DefaultAiClient(config),
): Promise<Runtime> {
  const { artifacts, errors } = await loadCorpusArtifacts(config.corpusDir);
  const { corpus, report } = buildCorpus(artifacts);

  const documentStore = InMemoryDocumentStore.fromCorpus(corpus);
  const summaryIndex = new InMemorySummaryIndex(aiClient);
  await summaryIndex.addEntries(corpus.summaries);

  const retriever = new HybridRetriever(summaryIndex, documentStore, corpus, {
    textFallbackCount: config.fallbackTextCount,
    imageFallbackCount: config.fallbackImageCount,
  });
  const service = new QuestionAnswerService(retriever, aiClient, {
    kInitial: config.kInitial,
    kExpand: config.kExpand,
    maxReferences: config.maxReferences,
    indexTimeoutMs: config.indexTimeoutMs,
    answerTimeoutMs: config.answerTimeoutMs,
  });

  return { service, corpus, documentStore, summaryIndex, report, loadErrors: errors };
}
