import { Logger } from "@nestjs/common";
import { z } from "zod";

import { MalformedFeedError } from "@wattkeeper/domain";
import type { PriceTier } from "@wattkeeper/domain";
import { formatIssues } from "../../config/schemas";
import { extractGenerationId } from "../generation-id";
import { fetchFeed } from "./feed-http";
import type { FeedArtifact, PriceFeedProvider } from "./feed.types";

const payloadSchema = z.object({
  artifact: z.string().min(1),
  points: z.array(
    z.object({
      timestamp: z.union([z.string(), z.number()]),
      price: z.number(),
    }),
  ),
});

export interface HttpJsonProviderOptions {
  tier: PriceTier;
  url: string;
  timeoutMs: number;
}

/**
 * JSON relay of a price feed. The URL may contain `{region}`; the payload is
 * `{artifact, points: [{timestamp, price}]}`.
 */
export class HttpJsonFeedProvider implements PriceFeedProvider {
  readonly key: string;
  readonly tier: PriceTier;
  private readonly logger = new Logger(HttpJsonFeedProvider.name);

  constructor(private readonly options: HttpJsonProviderOptions) {
    this.tier = options.tier;
    this.key = `http_json:${options.tier}`;
  }

  async fetchArtifact(region: string): Promise<FeedArtifact> {
    const url = this.options.url.replace("{region}", encodeURIComponent(region));
    this.logger.log(`Fetching ${this.tier} prices for ${region} from ${url}`);
    const {body} = await fetchFeed(url, this.options.timeoutMs);

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      throw new MalformedFeedError(`Response from ${url} is not JSON`, this.key);
    }
    const parsed = payloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedFeedError(`Unexpected payload from ${url}: ${formatIssues(parsed.error.issues)}`, this.key);
    }

    const generationId = extractGenerationId(parsed.data.artifact);
    if (!generationId) {
      throw new MalformedFeedError(`No generation id in ${parsed.data.artifact}`, this.key);
    }
    const points = parsed.data.points.flatMap((point) => {
      const timestamp = typeof point.timestamp === "number" ? point.timestamp : Date.parse(point.timestamp);
      return Number.isFinite(timestamp) ? [{timestamp, value: point.price}] : [];
    });
    return {artifact: parsed.data.artifact, generationId, points};
  }
}
