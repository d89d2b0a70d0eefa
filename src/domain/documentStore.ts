import { ContentItem } from "./types.js";

export interface DocumentStore {
  put(id: string, item: ContentItem): Promise<void>;
  /** Resolves ids in order; unknown ids resolve to null. */
  getMany(ids: readonly string[]): Promise<Array<ContentItem | null>>;
  size(): Promise<number>;
}
