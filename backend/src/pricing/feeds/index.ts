import type { ConfigDocument } from "../../config/schemas";
import type { PriceFeedProvider } from "./feed.types";
import { HttpJsonFeedProvider } from "./http-json.provider";
import { NemCsvFeedProvider } from "./nem-csv.provider";

export function createPriceFeedProviders(document: Readonly<ConfigDocument>): PriceFeedProvider[] {
  const timeoutMs = document.pricing.request_timeout_seconds * 1000;
  return document.pricing.feeds
    .filter((feed) => feed.enabled)
    .map((feed): PriceFeedProvider => {
      switch (feed.kind) {
        case "nem_csv":
          return new NemCsvFeedProvider({
            tier: feed.tier,
            url: feed.url,
            table: feed.table,
            listing: feed.listing ?? new URL(feed.url).pathname.endsWith("/"),
            timeoutMs,
          });
        case "http_json":
          return new HttpJsonFeedProvider({tier: feed.tier, url: feed.url, timeoutMs});
      }
    });
}
