import { DocumentStore } from "../../domain/documentStore.js";
import { ContentItem, Corpus } from "../../domain/types.js";

export class InMemoryDocumentStore implements DocumentStore {
  private readonly itemsById = new Map<string, ContentItem>();

  static fromCorpus(corpus: Corpus): InMemoryDocumentStore {
    const store = new InMemoryDocumentStore();
    for (const { id, item } of corpus.documents) {
      store.itemsById.set(id, item);
    }
    return store;
  }

  async put(id: string, item: ContentItem): Promise<void> {
    if (this.itemsById.has(id)) {
      throw new Error(`Identifier already in use: ${id}`);
    }
    this.itemsById.set(id, item);
  }

  async getMany(ids: readonly string[]): Promise<Array<ContentItem | null>> {
    return ids.map((id) => this.itemsById.get(id) ?? null);
  }

  async size(): Promise<number> {
    return this.itemsById.size;
  }
}
