import type { PriceTier } from "@wattkeeper/domain";

export interface FeedPoint {
  timestamp: number;
  value: number;
}

export interface FeedArtifact {
  artifact: string;
  generationId: string;
  points: FeedPoint[];
}

export interface PriceFeedProvider {
  readonly key: string;
  readonly tier: PriceTier;
  /**
   * `lastGenerationId` is the newest generation already applied for this
   * region and tier; a provider may answer with an empty artifact when it
   * has nothing newer.
   */
  fetchArtifact(region: string, lastGenerationId?: string | null): Promise<FeedArtifact>;
}

export const PRICE_FEED_PROVIDERS = Symbol("PRICE_FEED_PROVIDERS");
