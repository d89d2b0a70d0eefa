import { describe, expect, it } from "vitest";
import { NO_CONTEXT_ANSWER, buildContextDigest } from "../src/pipelines/answering.js";
import { RetrievalContext } from "../src/domain/types.js";
import { safetyNotes } from "../src/rules/safetyNotes.js";

function contextOf(texts: string[]): RetrievalContext {
  return { texts, images: [], origin: { texts: "keyword", images: "keyword" } };
}

describe("buildContextDigest", () => {
  const passages = ["One.", "Two.", "Three.", "Four."];

  it("lists up to three cleaned passages for simple questions", () => {
    expect(buildContextDigest("low sodium snacks", contextOf(passages))).toBe(
      "- One.\n- Two.\n- Three.",
    );
  });

  it("lists more passages for comparative questions", () => {
    expect(buildContextDigest("compare snacks", contextOf(passages))).toBe(
      "- One.\n- Two.\n- Three.\n- Four.",
    );
  });

  it("strips highlight markup and shortens long passages", () => {
    const long = `<mark>Sodium</mark> ${"z".repeat(200)}`;
    expect(buildContextDigest("sodium", contextOf([long]))).toBe(
      `- Sodium ${"z".repeat(170)}...`,
    );
  });

  it("reports missing context", () => {
    expect(buildContextDigest("sodium", contextOf([]))).toBe(NO_CONTEXT_ANSWER);
  });
});

describe("safetyNotes", () => {
  it("joins every flagged note", () => {
    expect(safetyNotes("Is grapefruit with herbal tea safe?")).toBe(
      "grapefruit: May interact with certain meds; verify with clinician.; herbal: Herbal supplements can accumulate or interact; caution.",
    );
  });

  it("returns an empty string without flags", () => {
    expect(safetyNotes("low sodium snacks")).toBe("");
  });
});
