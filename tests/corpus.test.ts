import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MalformedItemError } from "../src/domain/errors.js";
import {
  buildCorpus,
  normalizeImagePayload,
} from "../src/infra/corpus/corpusBuilder.js";
import { loadArtifact, loadCorpusArtifacts } from "../src/infra/corpus/corpusLoader.js";
import { InMemoryDocumentStore } from "../src/infra/store/inMemoryDocumentStore.js";

const TEMP_DIR = path.resolve(".tmp-tests-corpus");

async function writeArtifact(fileName: string, content: string): Promise<void> {
  await fs.writeFile(path.join(TEMP_DIR, fileName), content, "utf-8");
}

describe("corpus loading", () => {
  beforeEach(async () => {
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await writeArtifact(
      "texts.json",
      JSON.stringify(["Alpha passage", { text: "Beta passage" }, 42]),
    );
    await writeArtifact(
      "text_summaries.json",
      JSON.stringify(["Alpha summary", "Beta summary", "Gamma summary"]),
    );
    await writeArtifact(
      "images.json",
      JSON.stringify(["data:image/png;base64,aGVsbG8=", "not base64!!"]),
    );
    await writeArtifact("image_summaries.json", JSON.stringify(["Chart (2020) of alpha", "Broken"]));
    await writeArtifact("table_summaries.json", "{not json");
  });

  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("reports missing and invalid artifacts and continues with the rest", async () => {
    const { artifacts, errors } = await loadCorpusArtifacts(TEMP_DIR);

    expect(artifacts.tables).toEqual([]);
    expect(artifacts.tableSummaries).toEqual([]);
    expect(artifacts.texts).toHaveLength(3);
    expect(
      errors
        .map(({ artifact, kind }) => ({ artifact, kind }))
        .sort((a, b) => (a.artifact < b.artifact ? -1 : 1)),
    ).toEqual([
      { artifact: "table_summaries.json", kind: "invalid" },
      { artifact: "tables.json", kind: "missing" },
    ]);
  });

  it("rejects artifacts that are not arrays", async () => {
    await writeArtifact("tables.json", JSON.stringify({ rows: [] }));

    const result = await loadArtifact(TEMP_DIR, "tables");

    expect(result).toEqual({
      ok: false,
      error: { artifact: "tables.json", kind: "invalid", message: "Expected a JSON array of items." },
    });
  });

  it("pairs items with summaries and skips malformed ones", async () => {
    const { artifacts } = await loadCorpusArtifacts(TEMP_DIR);
    let next = 0;

    const { corpus, report } = buildCorpus(artifacts, { createId: () => `id-${++next}` });

    expect(report).toEqual({ documents: { text: 2, table: 0, image: 1 }, malformed: 2 });
    expect(corpus.summaries).toEqual([
      { id: "id-1", modality: "text", summary: "Alpha summary" },
      { id: "id-2", modality: "text", summary: "Beta summary" },
      { id: "id-3", modality: "image", summary: "Chart of alpha" },
    ]);
    expect(corpus.pools).toEqual({
      textSummaries: ["Alpha summary", "Beta summary", "Gamma summary"],
      texts: ["Alpha passage", "Beta passage"],
      images: [{ kind: "image", data: "aGVsbG8=", caption: "Chart of alpha" }],
    });

    const store = InMemoryDocumentStore.fromCorpus(corpus);
    await expect(store.getMany(["id-2", "id-9"])).resolves.toEqual([
      { kind: "text", text: "Beta passage" },
      null,
    ]);
    await expect(store.size()).resolves.toBe(3);
  });
});

describe("normalizeImagePayload", () => {
  it("unwraps data URIs and removes line breaks", () => {
    expect(normalizeImagePayload("data:image/jpeg;base64,aGVs\nbG8=")).toBe("aGVsbG8=");
  });

  it("rejects values that are not base64", () => {
    expect(() => normalizeImagePayload("abc")).toThrow(MalformedItemError);
    expect(() => normalizeImagePayload(12)).toThrow(MalformedItemError);
  });
});

describe("InMemoryDocumentStore", () => {
  it("refuses to reuse an identifier", async () => {
    const store = new InMemoryDocumentStore();
    await store.put("a", { kind: "text", text: "first" });

    await expect(store.put("a", { kind: "text", text: "second" })).rejects.toThrow(
      "Identifier already in use: a",
    );
  });
});
