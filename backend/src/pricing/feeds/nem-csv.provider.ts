import { Logger } from "@nestjs/common";
import AdmZip from "adm-zip";

import { compareGenerationIds, MalformedFeedError, TransientIoError } from "@wattkeeper/domain";
import type { PriceTier } from "@wattkeeper/domain";
import { extractGenerationId } from "../generation-id";
import { fetchFeed, fetchFeedBytes } from "./feed-http";
import type { FeedArtifact, PriceFeedProvider } from "./feed.types";
import { nemReportGenerationId, parseNemCsv } from "./nem-csv.parser";

const DEFAULT_TABLES: Record<PriceTier, string> = {
  historical: "DREGION",
  five_min_forecast: "P5MIN_REGIONSOLUTION",
  thirty_min_forecast: "PDREGION",
};
// One report covers every region; reuse it while a sync walks the regions.
const REPORT_REUSE_MS = 60_000;
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const HREF_PATTERN = /href\s*=\s*["']([^"']+)["']/gi;

export interface NemCsvProviderOptions {
  tier: PriceTier;
  url: string;
  table?: string;
  /** Treat `url` as a directory listing of zipped reports. */
  listing?: boolean;
  timeoutMs: number;
  now?: () => number;
}

export interface ListedReport {
  name: string;
  url: string;
  generationId: string;
}

interface LoadedReport {
  body: string;
  artifactName: string;
}

class RecentFetch<T> {
  private entry: { key: string; at: number; value: Promise<T> } | null = null;

  constructor(private readonly now: () => number) {
  }

  get(key: string, load: () => Promise<T>): Promise<T> {
    const now = this.now();
    if (this.entry && this.entry.key === key && now - this.entry.at < REPORT_REUSE_MS) {
      return this.entry.value;
    }
    const value = load();
    const entry = {key, at: now, value};
    this.entry = entry;
    void value.catch(() => {
      if (this.entry === entry) {
        this.entry = null;
      }
    });
    return value;
  }
}

/**
 * Reads NEM-style multi-table CSV reports, either from a fixed URL or from the
 * newest zipped report in a directory listing such as `Reports/Current/Dispatch_Reports/`.
 */
export class NemCsvFeedProvider implements PriceFeedProvider {
  readonly key: string;
  readonly tier: PriceTier;
  private readonly logger = new Logger(NemCsvFeedProvider.name);
  private readonly table: string;
  private readonly listing: boolean;
  private readonly listings: RecentFetch<ListedReport>;
  private readonly reports: RecentFetch<LoadedReport>;

  constructor(private readonly options: NemCsvProviderOptions) {
    this.tier = options.tier;
    this.key = `nem_csv:${options.tier}`;
    this.table = options.table ?? DEFAULT_TABLES[options.tier];
    this.listing = options.listing ?? false;
    const now = options.now ?? Date.now;
    this.listings = new RecentFetch(now);
    this.reports = new RecentFetch(now);
  }

  async fetchArtifact(region: string, lastGenerationId: string | null = null): Promise<FeedArtifact> {
    let url = this.options.url;
    if (this.listing) {
      const latest = await this.listings.get(url, () => this.findLatestReport());
      if (lastGenerationId && compareGenerationIds(latest.generationId, lastGenerationId) <= 0) {
        this.logger.verbose(`${this.table} ${region}: newest listed ${latest.generationId} already applied`);
        return {artifact: latest.name, generationId: latest.generationId, points: []};
      }
      url = latest.url;
    }

    const {body, artifactName} = await this.reports.get(url, () => this.loadReport(url));
    const generationId = extractGenerationId(artifactName) ?? nemReportGenerationId(body);
    if (!generationId) {
      throw new MalformedFeedError(`No generation id in ${artifactName || url}`, this.key);
    }
    const points = parseNemCsv(body, {table: this.table, region});
    this.logger.verbose(`${this.table} ${region}: ${points.length} points (generation=${generationId})`);
    return {artifact: artifactName, generationId, points};
  }

  private async findLatestReport(): Promise<ListedReport> {
    this.logger.log(`Scanning ${this.options.url} for ${this.table} reports`);
    const {body} = await fetchFeed(this.options.url, this.options.timeoutMs);
    const latest = parseReportListing(body, this.options.url)
      .reduce<ListedReport | null>((best, entry) => (
        !best || compareGenerationIds(entry.generationId, best.generationId) > 0 ? entry : best
      ), null);
    if (!latest) {
      throw new TransientIoError(`No zipped reports listed at ${this.options.url}`);
    }
    return latest;
  }

  private async loadReport(url: string): Promise<LoadedReport> {
    this.logger.log(`Fetching ${this.table} report from ${url}`);
    const {bytes, artifactName} = await fetchFeedBytes(url, this.options.timeoutMs);
    if (!bytes.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE)) {
      return {body: bytes.toString("utf8"), artifactName};
    }
    return {body: extractCsv(bytes, artifactName, this.key), artifactName};
  }
}

/** Zipped reports linked from a directory listing page, resolved against the page URL. */
export function parseReportListing(html: string, pageUrl: string): ListedReport[] {
  const reports: ListedReport[] = [];
  const seen = new Set<string>();
  for (const match of html.matchAll(HREF_PATTERN)) {
    const url = new URL(match[1], pageUrl);
    const name = decodeURIComponent(url.pathname.slice(url.pathname.lastIndexOf("/") + 1));
    const generationId = name.toLowerCase().endsWith(".zip") ? extractGenerationId(name) : null;
    if (!generationId || seen.has(url.href)) {
      continue;
    }
    seen.add(url.href);
    reports.push({name, url: url.href, generationId});
  }
  return reports;
}

export function extractCsv(bytes: Buffer, artifactName: string, source: string): string {
  let archive: AdmZip;
  try {
    archive = new AdmZip(bytes);
  } catch (error) {
    throw new MalformedFeedError(`Unreadable archive ${artifactName}`, source, {cause: error});
  }
  const entry = archive
    .getEntries()
    .find((candidate) => !candidate.isDirectory && candidate.entryName.toLowerCase().endsWith(".csv"));
  if (!entry) {
    throw new MalformedFeedError(`No CSV file in ${artifactName}`, source);
  }
  return entry.getData().toString("utf8");
}
