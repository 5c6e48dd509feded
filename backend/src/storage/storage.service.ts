import { mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";
import { z } from "zod";

import type { DaySummary, RunResult, RunStatistics, SimulationConfig, SimulationEvent, StepRecord } from "@gridtwin/domain";
import { daySummarySchema, runStatisticsSchema, simulationEventSchema, stepRecordSchema } from "@gridtwin/domain";

const IN_MEMORY = ":memory:";

export interface StoredRun {
  id: number;
  createdAt: string;
  strategy: string;
  season: string;
  seed: number;
  statistics: RunStatistics;
}

const runRowSchema = z.object({
  id: z.number().int(),
  created_at: z.string(),
  strategy: z.string(),
  season: z.string(),
  seed: z.number().int(),
  statistics: z.string(),
});

const stepRowSchema = stepRecordSchema.extend({
  inverter_operational: z.union([z.literal(0), z.literal(1)]).transform((value) => value === 1),
});

const STEP_COLUMNS = [
  "step", "timestamp", "hour", "solar_available_kw", "solar_generated_kw", "load_demand_kw", "cloud_coverage",
  "battery_soc", "solar_to_load", "solar_to_battery", "solar_to_grid", "battery_to_load", "grid_to_load",
  "unmet_load", "curtailed", "inverter_operational",
] as const;

const DAY_COLUMNS = [
  "day", "solar_generated_kwh", "load_consumed_kwh", "grid_imported_kwh", "grid_exported_kwh", "curtailed_kwh",
  "battery_soc_end", "self_sufficiency_percent",
] as const;

@Injectable()
export class StorageService implements OnModuleDestroy {
  private readonly dbPath: string;
  private db: Database | null = null;
  private readonly logger = new Logger(StorageService.name);

  constructor(@Inject(ConfigService) configService: ConfigService) {
    const override = configService.get<string>("GRIDTWIN_STORAGE_PATH")?.trim();
    if (override === IN_MEMORY) {
      this.dbPath = IN_MEMORY;
    } else {
      this.dbPath = override && override.length > 0
        ? resolve(process.cwd(), override)
        : join(process.cwd(), "..", "data", "db", "gridtwin.sqlite");
    }
  }

  get path(): string {
    return this.dbPath;
  }

  onModuleDestroy(): void {
    if (!this.db) {
      return;
    }
    this.db.close();
    this.db = null;
    this.logger.verbose("Storage connection closed");
  }

  saveRun(result: RunResult, config: SimulationConfig, createdAt: Date = new Date()): number {
    const db = this.connection();
    const statistics = runStatisticsSchema.parse(result);
    const insertRun = db.prepare(
      "INSERT INTO runs (created_at, strategy, season, seed, statistics, config) VALUES (?, ?, ?, ?, ?, ?)",
    );
    const insertStep = db.prepare(
      `INSERT INTO steps (run_id, ${STEP_COLUMNS.join(", ")}) VALUES (@run_id, ${STEP_COLUMNS.map((column) => `@${column}`).join(", ")})`,
    );
    const insertDay = db.prepare(
      `INSERT INTO days (run_id, ${DAY_COLUMNS.join(", ")}) VALUES (@run_id, ${DAY_COLUMNS.map((column) => `@${column}`).join(", ")})`,
    );
    const insertEvent = db.prepare("INSERT INTO events (run_id, timestamp, message) VALUES (?, ?, ?)");

    const txn = db.transaction(() => {
      const info = insertRun.run(
        createdAt.toISOString(),
        statistics.summary.strategy,
        statistics.summary.season,
        statistics.seed,
        JSON.stringify(statistics),
        JSON.stringify(config),
      );
      const runId = Number(info.lastInsertRowid);
      for (const record of result.steps) {
        insertStep.run({
          run_id: runId,
          step: record.step,
          timestamp: record.timestamp,
          hour: record.hour,
          solar_available_kw: record.solar_available_kw,
          solar_generated_kw: record.solar_generated_kw,
          load_demand_kw: record.load_demand_kw,
          cloud_coverage: record.cloud_coverage,
          battery_soc: record.battery_soc,
          solar_to_load: record.solar_to_load,
          solar_to_battery: record.solar_to_battery,
          solar_to_grid: record.solar_to_grid,
          battery_to_load: record.battery_to_load,
          grid_to_load: record.grid_to_load,
          unmet_load: record.unmet_load,
          curtailed: record.curtailed,
          inverter_operational: record.inverter_operational ? 1 : 0,
        });
      }
      for (const summary of result.days) {
        insertDay.run({run_id: runId, ...summary});
      }
      for (const event of result.events) {
        insertEvent.run(runId, event.timestamp, event.message);
      }
      return runId;
    });

    const runId = txn();
    this.logger.log(
      `Stored run ${runId} (${result.steps.length} steps, ${result.days.length} days, ${result.events.length} events)`,
    );
    return runId;
  }

  getRun(id: number): StoredRun | null {
    this.logger.verbose(`Fetching run ${id}`);
    const row: unknown = this.connection()
      .prepare("SELECT id, created_at, strategy, season, seed, statistics FROM runs WHERE id = ?")
      .get(id);
    return row === undefined ? null : this.toStoredRun(row);
  }

  listRuns(limit = 20): StoredRun[] {
    this.logger.verbose(`Listing runs (limit=${limit})`);
    const rows: unknown[] = this.connection()
      .prepare("SELECT id, created_at, strategy, season, seed, statistics FROM runs ORDER BY id DESC LIMIT ?")
      .all(limit);
    return rows.map((row) => this.toStoredRun(row));
  }

  getSteps(runId: number): StepRecord[] {
    const rows: unknown[] = this.connection()
      .prepare(`SELECT ${STEP_COLUMNS.join(", ")} FROM steps WHERE run_id = ? ORDER BY step`)
      .all(runId);
    return rows.map((row) => stepRowSchema.parse(row));
  }

  getDays(runId: number): DaySummary[] {
    const rows: unknown[] = this.connection()
      .prepare(`SELECT ${DAY_COLUMNS.join(", ")} FROM days WHERE run_id = ? ORDER BY day`)
      .all(runId);
    return rows.map((row) => daySummarySchema.parse(row));
  }

  getEvents(runId: number): SimulationEvent[] {
    const rows: unknown[] = this.connection()
      .prepare("SELECT timestamp, message FROM events WHERE run_id = ? ORDER BY id")
      .all(runId);
    return rows.map((row) => simulationEventSchema.parse(row));
  }

  private toStoredRun(raw: unknown): StoredRun {
    const row = runRowSchema.parse(raw);
    return {
      id: row.id,
      createdAt: row.created_at,
      strategy: row.strategy,
      season: row.season,
      seed: row.seed,
      statistics: runStatisticsSchema.parse(JSON.parse(row.statistics)),
    };
  }

  private connection(): Database {
    if (this.db) {
      return this.db;
    }
    if (this.dbPath !== IN_MEMORY) {
      mkdirSync(dirname(this.dbPath), {recursive: true});
    }
    const db = new DatabaseConstructor(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      db.pragma("journal_mode = WAL");
    }
    this.db = db;
    this.migrate(db);
    this.logger.log(`Storage initialised at ${this.dbPath}`);
    return db;
  }

  private migrate(db: Database): void {
    this.logger.verbose("Ensuring storage schema is up to date");
    db.exec(`
        CREATE TABLE IF NOT EXISTS runs
        (
            id         INTEGER PRIMARY KEY AUTOINCREMENT,
            created_at TEXT    NOT NULL,
            strategy   TEXT    NOT NULL,
            season     TEXT    NOT NULL,
            seed       INTEGER NOT NULL,
            statistics TEXT    NOT NULL,
            config     TEXT    NOT NULL
        );
    `);

    db.exec(`
        CREATE TABLE IF NOT EXISTS steps
        (
            run_id               INTEGER NOT NULL REFERENCES runs (id) ON DELETE CASCADE,
            step                 INTEGER NOT NULL,
            timestamp            TEXT    NOT NULL,
            hour                 REAL    NOT NULL,
            solar_available_kw   REAL    NOT NULL,
            solar_generated_kw   REAL    NOT NULL,
            load_demand_kw       REAL    NOT NULL,
            cloud_coverage       REAL    NOT NULL,
            battery_soc          REAL    NOT NULL,
            solar_to_load        REAL    NOT NULL,
            solar_to_battery     REAL    NOT NULL,
            solar_to_grid        REAL    NOT NULL,
            battery_to_load      REAL    NOT NULL,
            grid_to_load         REAL    NOT NULL,
            unmet_load           REAL    NOT NULL,
            curtailed            REAL    NOT NULL,
            inverter_operational INTEGER NOT NULL,
            PRIMARY KEY (run_id, step)
        );
    `);

    db.exec(`
        CREATE TABLE IF NOT EXISTS days
        (
            run_id                   INTEGER NOT NULL REFERENCES runs (id) ON DELETE CASCADE,
            day                      INTEGER NOT NULL,
            solar_generated_kwh      REAL    NOT NULL,
            load_consumed_kwh        REAL    NOT NULL,
            grid_imported_kwh        REAL    NOT NULL,
            grid_exported_kwh        REAL    NOT NULL,
            curtailed_kwh            REAL    NOT NULL,
            battery_soc_end          REAL    NOT NULL,
            self_sufficiency_percent REAL    NOT NULL,
            PRIMARY KEY (run_id, day)
        );
    `);

    db.exec(`
        CREATE TABLE IF NOT EXISTS events
        (
            id        INTEGER PRIMARY KEY AUTOINCREMENT,
            run_id    INTEGER NOT NULL REFERENCES runs (id) ON DELETE CASCADE,
            timestamp TEXT    NOT NULL,
            message   TEXT    NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_events_run ON events (run_id);
    `);
  }
}
