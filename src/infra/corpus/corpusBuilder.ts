import { randomUUID } from "node:crypto";
import { z } from "zod";
import { MalformedItemError } from "../../domain/errors.js";
import {
  ContentItem,
  Corpus,
  IdentifiedContent,
  ImageContent,
  Modality,
  SummaryEntry,
  modalityOf,
} from "../../domain/types.js";
import { sanitize } from "../../pipelines/formatting.js";
import { logger } from "../../utils/logger.js";
import { CorpusArtifacts } from "./corpusLoader.js";

// Element exports may arrive as plain strings or as {text} records.
const textLikeSchema = z.union([
  z.string(),
  z.object({ text: z.string() }).transform((value) => value.text),
]);

const DATA_URI_PREFIX = /^data:[^;,]+;base64,/;
const BASE64_REGEX = /^[A-Za-z0-9+/]+={0,2}$/;

export interface CorpusBuildReport {
  documents: Record<Modality, number>;
  malformed: number;
}

export interface BuildCorpusOptions {
  createId?: () => string;
}

interface GroupSpec {
  modality: Modality;
  originals: readonly unknown[];
  summaries: readonly unknown[];
  toItem: (original: unknown, summary: string) => ContentItem;
}

export function buildCorpus(
  artifacts: CorpusArtifacts,
  options?: BuildCorpusOptions,
): { corpus: Corpus; report: CorpusBuildReport } {
  const createId = options?.createId ?? randomUUID;
  const documents: IdentifiedContent[] = [];
  const summaries: SummaryEntry[] = [];
  const report: CorpusBuildReport = {
    documents: { text: 0, table: 0, image: 0 },
    malformed: 0,
  };

  const groups: GroupSpec[] = [
    {
      modality: "text",
      originals: artifacts.texts,
      summaries: artifacts.textSummaries,
      toItem: (original) => ({ kind: "text", text: normalizeTextItem(original) }),
    },
    {
      modality: "table",
      originals: artifacts.tables,
      summaries: artifacts.tableSummaries,
      toItem: (original) => ({ kind: "table", text: normalizeTextItem(original) }),
    },
    {
      modality: "image",
      originals: artifacts.images,
      summaries: artifacts.imageSummaries,
      toItem: (original, summary) => ({
        kind: "image",
        data: normalizeImagePayload(original),
        caption: summary,
      }),
    },
  ];

  for (const group of groups) {
    const count = Math.min(group.originals.length, group.summaries.length);
    for (let index = 0; index < count; index += 1) {
      try {
        const summary = normalizeSummary(group.summaries[index]);
        const item = group.toItem(group.originals[index], summary);
        const id = createId();
        const modality = modalityOf(item);
        documents.push({ id, item });
        summaries.push({ id, modality, summary });
        report.documents[modality] += 1;
      } catch (error) {
        if (!(error instanceof MalformedItemError)) {
          throw error;
        }
        report.malformed += 1;
        logger.debug("Skipping malformed corpus item", {
          modality: group.modality,
          index,
          reason: error.message,
        });
      }
    }
  }

  const corpus: Corpus = {
    documents,
    summaries,
    pools: {
      textSummaries: collectValid(artifacts.textSummaries, normalizeSummary),
      texts: collectValid(artifacts.texts, normalizeTextItem),
      images: documents
        .map(({ item }) => item)
        .filter((item): item is ImageContent => item.kind === "image"),
    },
  };

  if (documents.length === 0) {
    logger.warn("Corpus has no content in any modality; answers will have empty context");
  }
  logger.info("Corpus built", { ...report.documents, malformed: report.malformed });

  return { corpus, report };
}

export function normalizeTextItem(value: unknown): string {
  const parsed = textLikeSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedItemError("Expected a string or an object with a text field.");
  }
  return parsed.data;
}

export function normalizeSummary(value: unknown): string {
  const summary = sanitize(normalizeTextItem(value));
  if (!summary) {
    throw new MalformedItemError("Summary is empty.");
  }
  return summary;
}

/** Returns a bare base64 payload; data URIs are unwrapped. */
export function normalizeImagePayload(value: unknown): string {
  if (typeof value !== "string") {
    throw new MalformedItemError("Image payload must be a base64 string.");
  }

  const payload = value.trim().replace(DATA_URI_PREFIX, "").replace(/\s+/g, "");
  if (!payload || payload.length % 4 !== 0 || !BASE64_REGEX.test(payload)) {
    throw new MalformedItemError("Image payload is not valid base64.");
  }
  return payload;
}

function collectValid(values: readonly unknown[], normalize: (value: unknown) => string): string[] {
  const out: string[] = [];
  for (const value of values) {
    try {
      out.push(normalize(value));
    } catch (error) {
      if (!(error instanceof MalformedItemError)) {
        throw error;
      }
    }
  }
  return out;
}
