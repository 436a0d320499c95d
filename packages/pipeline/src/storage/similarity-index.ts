import type { StorageGateway } from "./gateway.js";
import type { SimilarMatch } from "./types.js";

export type SimilaritySearch = {
  vector: number[];
  threshold: number;
  since: Date;
  excludeItemId?: string;
};

/**
 * Cosine nearest-neighbour lookups over item embeddings. A match is only
 * returned when its similarity is strictly above the threshold.
 */
export class SimilarityIndex {
  constructor(private readonly store: StorageGateway) {}

  findGlobal(search: SimilaritySearch): Promise<SimilarMatch | null> {
    if (search.vector.length === 0) return Promise.resolve(null);
    return this.store.findSimilarItem(search);
  }

  findInChannel(search: SimilaritySearch & { channelId: string }): Promise<SimilarMatch | null> {
    if (search.vector.length === 0) return Promise.resolve(null);
    return this.store.findSimilarItemInChannel(search);
  }
}
