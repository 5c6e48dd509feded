import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";

import type { RunResult, SimulationConfig } from "@gridtwin/domain";
import { runStatisticsSchema } from "@gridtwin/domain";

type Cell = string | number | boolean;

const STEP_HEADERS = [
  "timestamp", "step", "hour", "solar_generated_kw", "solar_available_kw", "load_demand_kw", "cloud_coverage",
  "battery_soc", "solar_to_load", "solar_to_battery", "solar_to_grid", "battery_to_load", "grid_to_load",
  "unmet_load", "curtailed", "inverter_operational",
] as const;

const DAY_HEADERS = [
  "day", "solar_generated_kwh", "load_consumed_kwh", "grid_imported_kwh", "grid_exported_kwh", "curtailed_kwh",
  "battery_soc_end", "self_sufficiency_percent",
] as const;

export function escapeCsvCell(value: Cell): string {
  const text = String(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, "\"\"")}"` : text;
}

export function toCsv(headers: readonly string[], rows: readonly (readonly Cell[])[]): string {
  const lines = [headers.map(escapeCsvCell).join(",")];
  for (const row of rows) {
    lines.push(row.map(escapeCsvCell).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function formatRunStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

@Injectable()
export class ResultExportService {
  private readonly logger = new Logger(ResultExportService.name);

  runDirectoryName(result: RunResult, createdAt: Date): string {
    const {strategy, season, duration_days: days} = result.summary;
    return `sim_${formatRunStamp(createdAt)}_${strategy}_${season}_${days}d`;
  }

  /** Writes one run as CSV and JSON files; returns the directory it created. */
  async exportRun(
    result: RunResult,
    config: SimulationConfig,
    baseDirectory: string,
    createdAt: Date = new Date(),
  ): Promise<string> {
    const directory = resolve(baseDirectory, this.runDirectoryName(result, createdAt));
    await mkdir(directory, {recursive: true});

    const hourly = toCsv(STEP_HEADERS, result.steps.map((record) => STEP_HEADERS.map((key) => record[key])));
    const daily = toCsv(DAY_HEADERS, result.days.map((summary) => DAY_HEADERS.map((key) => summary[key])));
    const events = toCsv(["timestamp", "message"], result.events.map((event) => [event.timestamp, event.message]));
    const summary = runStatisticsSchema.parse(result);
    const effectiveConfig = {
      ...config,
      simulation: {...config.simulation, actual_seed_used: result.seed},
    };

    await Promise.all([
      writeFile(join(directory, "hourly_data.csv"), hourly, "utf-8"),
      writeFile(join(directory, "daily_summaries.csv"), daily, "utf-8"),
      writeFile(join(directory, "events_log.csv"), events, "utf-8"),
      writeFile(join(directory, "summary.json"), `${JSON.stringify(summary, null, 2)}\n`, "utf-8"),
      writeFile(join(directory, "config.json"), `${JSON.stringify(effectiveConfig, null, 2)}\n`, "utf-8"),
    ]);
    this.logger.log(`Results exported to ${directory}`);
    return directory;
  }
}
