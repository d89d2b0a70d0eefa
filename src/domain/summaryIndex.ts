import { Modality, SummaryEntry } from "./types.js";

export interface SummaryHit {
  id: string;
  modality: Modality;
}

export interface SummaryIndexStats {
  entries: number;
  embedded: number;
}

export interface SummaryIndex {
  addEntries(entries: readonly SummaryEntry[]): Promise<void>;
  query(text: string, k: number, signal?: AbortSignal): Promise<SummaryHit[]>;
  stats(): Promise<SummaryIndexStats>;
}
