import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { LoadError } from "../../domain/errors.js";
import { Result, err, ok, unwrapOr } from "../../domain/result.js";
import { describeError, logger } from "../../utils/logger.js";

export const ARTIFACT_FILES = {
  tables: "tables.json",
  texts: "texts.json",
  images: "images.json",
  textSummaries: "text_summaries.json",
  tableSummaries: "table_summaries.json",
  imageSummaries: "image_summaries.json",
} as const;

export type ArtifactName = keyof typeof ARTIFACT_FILES;

export type CorpusArtifacts = Record<ArtifactName, unknown[]>;

export interface LoadedArtifacts {
  artifacts: CorpusArtifacts;
  errors: LoadError[];
}

const artifactSchema = z.array(z.unknown());

export async function loadArtifact(
  directory: string,
  name: ArtifactName,
): Promise<Result<unknown[], LoadError>> {
  const fileName = ARTIFACT_FILES[name];
  const filePath = path.resolve(directory, fileName);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    return err({
      artifact: fileName,
      kind: isFileMissing(error) ? "missing" : "unreadable",
      message: describeError(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return err({ artifact: fileName, kind: "invalid", message: describeError(error) });
  }

  const validated = artifactSchema.safeParse(parsed);
  if (!validated.success) {
    return err({
      artifact: fileName,
      kind: "invalid",
      message: "Expected a JSON array of items.",
    });
  }
  return ok(validated.data);
}

/**
 * Loads the six artifact collections independently. A collection that is
 * missing or unreadable becomes empty and is reported in `errors`.
 */
export async function loadCorpusArtifacts(directory: string): Promise<LoadedArtifacts> {
  const errors: LoadError[] = [];

  const load = async (name: ArtifactName): Promise<unknown[]> => {
    const result = await loadArtifact(directory, name);
    if (!result.ok) {
      errors.push(result.error);
      logger.warn("Corpus artifact unavailable; continuing with an empty collection", {
        ...result.error,
      });
    }
    return unwrapOr(result, []);
  };

  const [tables, texts, images, textSummaries, tableSummaries, imageSummaries] =
    await Promise.all([
      load("tables"),
      load("texts"),
      load("images"),
      load("textSummaries"),
      load("tableSummaries"),
      load("imageSummaries"),
    ]);

  return {
    artifacts: { tables, texts, images, textSummaries, tableSummaries, imageSummaries },
    errors,
  };
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
