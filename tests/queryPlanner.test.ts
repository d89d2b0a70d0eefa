import { describe, expect, it } from "vitest";
import { needsExpandedRetrieval, planK } from "../src/retrieval/queryPlanner.js";

const depth = { kInitial: 6, kExpand: 10 };

describe("planK", () => {
  it("expands retrieval for comparative or evidence questions", () => {
    expect(planK("compare sodium and potassium limits", depth)).toBe(10);
    expect(planK("Meta-analysis of probiotics", depth)).toBe(10);
    expect(planK("rice vs pasta", depth)).toBe(10);
  });

  it("uses the initial depth otherwise", () => {
    expect(planK("low sodium snacks", depth)).toBe(6);
  });

  it("matches trigger words on word boundaries", () => {
    expect(needsExpandedRetrieval("canvas bags")).toBe(false);
  });
});
