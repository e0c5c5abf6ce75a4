import { mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";

import type { AutomationState, PriceRecord, PriceTier, UsageRecord } from "@wattkeeper/domain";
import { automationStateSchema, priceRecordSchema, usageRecordSchema } from "@wattkeeper/domain";

const IN_MEMORY = ":memory:";

export interface PriceKey {
  region: string;
  timestamp: number;
}

export interface SyncArtifactRecord {
  region: string;
  tier: PriceTier;
  generation_id: string;
  artifact: string;
  applied_at: string;
}

interface PayloadRow {
  payload: string;
}

@Injectable()
export class StorageService implements OnModuleDestroy {
  private readonly dbPath: string;
  private readonly db: Database;
  private readonly logger = new Logger(StorageService.name);

  constructor() {
    const override = process.env.WATTKEEPER_STORAGE_PATH?.trim();
    if (override === IN_MEMORY) {
      this.dbPath = IN_MEMORY;
    } else {
      const resolvedPath = override && override.length > 0
        ? resolve(process.cwd(), override)
        : join(process.cwd(), "..", "data", "db", "backend.sqlite");
      mkdirSync(dirname(resolvedPath), {recursive: true});
      this.dbPath = resolvedPath;
    }
    this.db = new DatabaseConstructor(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
    }
    this.migrate();
    this.logger.log(`Storage initialised at ${this.dbPath}`);
  }

  onModuleDestroy(): void {
    this.db.close();
    this.logger.verbose("Storage connection closed");
  }

  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  getPriceRecord(region: string, timestamp: number): PriceRecord | null {
    const row = this.db
      .prepare("SELECT payload FROM price_records WHERE region = ? AND timestamp = ?")
      .get(region, timestamp) as PayloadRow | undefined;
    return row ? priceRecordSchema.parse(JSON.parse(row.payload)) : null;
  }

  savePriceRecord(record: PriceRecord, timestamp: number): void {
    this.db
      .prepare(
        `INSERT INTO price_records (region, timestamp, payload)
         VALUES (?, ?, ?)
         ON CONFLICT (region, timestamp) DO UPDATE SET payload = excluded.payload`,
      )
      .run(record.region, timestamp, JSON.stringify(record));
  }

  deletePriceRecord(region: string, timestamp: number): boolean {
    const result = this.db.prepare("DELETE FROM price_records WHERE region = ? AND timestamp = ?").run(region, timestamp);
    return result.changes > 0;
  }

  listPriceKeys(): PriceKey[] {
    return this.db.prepare("SELECT region, timestamp FROM price_records ORDER BY region, timestamp").all() as PriceKey[];
  }

  listPriceRecords(region: string, from: number, to: number): PriceRecord[] {
    this.logger.verbose(`Listing price records for ${region} between ${from} and ${to}`);
    const rows = this.db
      .prepare(
        "SELECT payload FROM price_records WHERE region = ? AND timestamp >= ? AND timestamp <= ? ORDER BY timestamp",
      )
      .all(region, from, to) as PayloadRow[];
    return rows.map((row) => priceRecordSchema.parse(JSON.parse(row.payload)));
  }

  getSyncArtifact(region: string, tier: PriceTier): SyncArtifactRecord | null {
    const row = this.db
      .prepare("SELECT region, tier, generation_id, artifact, applied_at FROM sync_artifacts WHERE region = ? AND tier = ?")
      .get(region, tier) as SyncArtifactRecord | undefined;
    return row ?? null;
  }

  saveSyncArtifact(record: SyncArtifactRecord): void {
    this.db
      .prepare(
        `INSERT INTO sync_artifacts (region, tier, generation_id, artifact, applied_at)
         VALUES (@region, @tier, @generation_id, @artifact, @applied_at)
         ON CONFLICT (region, tier) DO UPDATE SET generation_id = excluded.generation_id,
                                                  artifact      = excluded.artifact,
                                                  applied_at    = excluded.applied_at`,
      )
      .run(record);
  }

  getAutomationState(deviceId: string): AutomationState | null {
    const row = this.db
      .prepare("SELECT payload FROM automation_states WHERE device_id = ?")
      .get(deviceId) as PayloadRow | undefined;
    if (!row) {
      return null;
    }
    return this.parseAutomationState(deviceId, row.payload);
  }

  listAutomationStates(): AutomationState[] {
    const rows = this.db
      .prepare("SELECT device_id, payload FROM automation_states ORDER BY device_id")
      .all() as (PayloadRow & { device_id: string })[];
    return rows.map((row) => this.parseAutomationState(row.device_id, row.payload));
  }

  saveAutomationState(state: AutomationState): void {
    this.db
      .prepare(
        `INSERT INTO automation_states (device_id, payload, updated_at)
         VALUES (?, ?, ?)
         ON CONFLICT (device_id) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`,
      )
      .run(state.device_id, JSON.stringify(state), new Date().toISOString());
  }

  deleteAutomationState(deviceId: string): boolean {
    return this.db.prepare("DELETE FROM automation_states WHERE device_id = ?").run(deviceId).changes > 0;
  }

  getSettings(): unknown {
    const row = this.db.prepare("SELECT payload FROM settings WHERE id = 1").get() as PayloadRow | undefined;
    return row ? (JSON.parse(row.payload) as unknown) : null;
  }

  saveSettings(payload: unknown): void {
    this.logger.log("Persisting user settings");
    this.db
      .prepare(
        `INSERT INTO settings (id, payload, updated_at)
         VALUES (1, ?, ?)
         ON CONFLICT (id) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`,
      )
      .run(JSON.stringify(payload), new Date().toISOString());
  }

  appendUsageRecords(entries: UsageRecord[]): void {
    if (!entries.length) {
      return;
    }
    this.logger.verbose(`Appending ${entries.length} usage records`);
    const stmt = this.db.prepare("INSERT INTO usage_records (device_id, period_end, payload) VALUES (?, ?, ?)");
    const txn = this.db.transaction((items: UsageRecord[]) => {
      for (const entry of items) {
        stmt.run(entry.device_id, entry.period_end, JSON.stringify(entry));
      }
    });
    txn(entries);
  }

  listUsageRecords(deviceId: string, limit = 288): UsageRecord[] {
    const rows = this.db
      .prepare("SELECT payload FROM usage_records WHERE device_id = ? ORDER BY period_end DESC LIMIT ?")
      .all(deviceId, limit) as PayloadRow[];
    return rows.map((row) => usageRecordSchema.parse(JSON.parse(row.payload)));
  }

  private parseAutomationState(deviceId: string, payload: string): AutomationState {
    const raw: unknown = JSON.parse(payload);
    const candidate = typeof raw === "object" && raw !== null ? {...raw, device_id: deviceId} : {device_id: deviceId};
    const parsed = automationStateSchema.safeParse(candidate);
    if (parsed.success) {
      return parsed.data;
    }
    this.logger.warn(`Discarding unreadable automation state for ${deviceId}; falling back to defaults`);
    return automationStateSchema.parse({device_id: deviceId});
  }

  private migrate(): void {
    this.logger.verbose("Ensuring storage schema is up to date");
    this.db.exec(`
        CREATE TABLE IF NOT EXISTS price_records
        (
            region    TEXT    NOT NULL,
            timestamp INTEGER NOT NULL,
            payload   TEXT    NOT NULL,
            PRIMARY KEY (region, timestamp)
        );
    `);

    this.db.exec(`
        CREATE TABLE IF NOT EXISTS sync_artifacts
        (
            region        TEXT NOT NULL,
            tier          TEXT NOT NULL,
            generation_id TEXT NOT NULL,
            artifact      TEXT NOT NULL,
            applied_at    TEXT NOT NULL,
            PRIMARY KEY (region, tier)
        );
    `);

    this.db.exec(`
        CREATE TABLE IF NOT EXISTS automation_states
        (
            device_id  TEXT PRIMARY KEY,
            payload    TEXT NOT NULL,
            updated_at TEXT NOT NULL
        );
    `);

    this.db.exec(`
        CREATE TABLE IF NOT EXISTS settings
        (
            id         INTEGER PRIMARY KEY CHECK (id = 1),
            payload    TEXT NOT NULL,
            updated_at TEXT NOT NULL
        );
    `);

    this.db.exec(`
        CREATE TABLE IF NOT EXISTS usage_records
        (
            id         INTEGER PRIMARY KEY AUTOINCREMENT,
            device_id  TEXT NOT NULL,
            period_end TEXT NOT NULL,
            payload    TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_usage_records_device ON usage_records (device_id, period_end DESC);
    `);
  }
}
