import { MalformedFeedError } from "@wattkeeper/domain";

import type { FeedPoint } from "./feed.types";

const DATETIME_COLUMNS = ["SETTLEMENTDATE", "INTERVAL_DATETIME", "DATETIME", "PERIODID"];
// Market time is fixed UTC+10 all year round.
const MARKET_OFFSET_MS = 10 * 3_600_000;
const DATETIME_PATTERN =
  /^(?:(\d{4})[/-](\d{2})[/-](\d{2})|(\d{2})\/(\d{2})\/(\d{4}))[ T](\d{2}):(\d{2})(?::(\d{2}))?$/;

export interface NemCsvOptions {
  table: string;
  region: string;
}

interface TableLayout {
  regionIndex: number;
  datetimeIndex: number;
  priceIndex: number;
}

/**
 * Reads regional prices from a NEM-style report: `I` rows declare a table's
 * columns (from index 4 on), `D` rows carry its data. Rows for other regions or
 * with unreadable values are skipped; prices are rounded to cents.
 */
export function parseNemCsv(text: string, options: NemCsvOptions): FeedPoint[] {
  const wanted = options.table.toUpperCase();
  let layout: TableLayout | null = null;
  let sawTable = false;
  const points = new Map<number, number>();

  for (const rawLine of text.split(/\r?\n/)) {
    const parts = rawLine.trim().split(",").map((part) => part.trim().replace(/^"|"$/g, ""));
    if (parts.length < 5) {
      continue;
    }
    const [rowType] = parts;
    if (rowType !== "I" && rowType !== "D") {
      continue;
    }
    if (!matchesTable(parts[1], parts[2], wanted)) {
      if (rowType === "I") {
        layout = null;
      }
      continue;
    }

    const values = parts.slice(4);
    if (rowType === "I") {
      sawTable = true;
      layout = resolveLayout(values);
      continue;
    }
    if (!layout || values[layout.regionIndex] !== options.region) {
      continue;
    }
    const timestamp = parseMarketTime(values[layout.datetimeIndex] ?? "");
    const price = Number.parseFloat(values[layout.priceIndex] ?? "");
    if (timestamp === null || !Number.isFinite(price)) {
      continue;
    }
    points.set(timestamp, Math.round(price * 100) / 100);
  }

  if (!sawTable) {
    throw new MalformedFeedError(`Report has no ${options.table} table`);
  }
  return [...points.entries()]
    .sort(([a], [b]) => a - b)
    .map(([timestamp, value]) => ({timestamp, value}));
}

/** `C` header row: report date and time, in market time, as a generation id. */
export function nemReportGenerationId(text: string): string | null {
  const newline = text.indexOf("\n");
  const firstLine = (newline === -1 ? text : text.slice(0, newline)).trim();
  const parts = firstLine.split(",").map((part) => part.trim());
  if (parts[0] !== "C") {
    return null;
  }
  const date = /^(\d{4})\/(\d{2})\/(\d{2})$/.exec(parts[5] ?? "");
  const time = /^(\d{2}):(\d{2})(?::\d{2})?$/.exec(parts[6] ?? "");
  if (!date || !time) {
    return null;
  }
  return `${date[1]}${date[2]}${date[3]}${time[1]}${time[2]}`;
}

export function parseMarketTime(value: string): number | null {
  const match = DATETIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const year = Number(match[1] ?? match[6]);
  const month = Number(match[2] ?? match[5]);
  const day = Number(match[3] ?? match[4]);
  const utc = Date.UTC(year, month - 1, day, Number(match[7]), Number(match[8]), Number(match[9] ?? 0));
  return Number.isNaN(utc) ? null : utc - MARKET_OFFSET_MS;
}

function matchesTable(group: string, name: string, wanted: string): boolean {
  const qualified = name ? `${group}_${name}` : group;
  return qualified.toUpperCase() === wanted;
}

function resolveLayout(columns: string[]): TableLayout | null {
  const upper = columns.map((column) => column.toUpperCase());
  const regionIndex = upper.indexOf("REGIONID");
  const priceIndex = upper.indexOf("RRP");
  const datetimeIndex = DATETIME_COLUMNS.map((name) => upper.indexOf(name)).find((index) => index >= 0) ?? -1;
  if (regionIndex < 0 || priceIndex < 0 || datetimeIndex < 0) {
    return null;
  }
  return {regionIndex, datetimeIndex, priceIndex};
}
