import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { SeededRandom } from "@gridtwin/domain";
import { ResultExportService, escapeCsvCell, formatRunStamp, toCsv } from "../src/export/result-export.service";
import { SimulationEngine } from "../src/simulation/simulation-engine";
import { buildConfig } from "./support/fixtures";

describe("CSV helpers", () => {
  it("quotes cells with separators or quotes", () => {
    expect(escapeCsvCell("plain")).toBe("plain");
    expect(escapeCsvCell("a,\"b\"")).toBe("\"a,\"\"b\"\"\"");
    expect(escapeCsvCell(true)).toBe("true");
  });

  it("writes a header and one line per row", () => {
    expect(toCsv(["a", "b"], [[1, "x"], [2.5, "y"]])).toBe("a,b\n1,x\n2.5,y\n");
  });

  it("formats the run stamp in UTC", () => {
    expect(formatRunStamp(new Date(Date.UTC(2024, 5, 1, 12, 30, 5)))).toBe("20240601_123005");
  });
});

describe("ResultExportService", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "gridtwin-export-"));
  });

  afterEach(async () => {
    await rm(directory, {recursive: true, force: true});
  });

  it("writes the run files into a dedicated directory", async () => {
    const config = buildConfig({
      simulation: {duration_days: 1},
      inverter: {failure_rate: 1, min_failure_duration_hours: 2, max_failure_duration_hours: 2},
    });
    const result = new SimulationEngine(config, new SeededRandom(42), 42).run();
    const service = new ResultExportService();

    const output = await service.exportRun(result, config, directory, new Date(Date.UTC(2024, 5, 1, 12, 30, 5)));
    expect(basename(output)).toBe("sim_20240601_123005_LOAD_PRIORITY_summer_1d");

    const hourly = (await readFile(join(output, "hourly_data.csv"), "utf-8")).trimEnd().split("\n");
    expect(hourly).toHaveLength(25);
    expect(hourly[0].split(",").slice(0, 3)).toEqual(["timestamp", "step", "hour"]);
    expect(hourly[1].startsWith("2024-06-01 00:00:00,0,0,")).toBe(true);

    const daily = (await readFile(join(output, "daily_summaries.csv"), "utf-8")).trimEnd().split("\n");
    expect(daily).toHaveLength(2);

    const events = await readFile(join(output, "events_log.csv"), "utf-8");
    expect(events).toBe("timestamp,message\n2024-06-01 23:00:00,Inverter FAILURE (remaining: 2h)\n");

    const summary: unknown = JSON.parse(await readFile(join(output, "summary.json"), "utf-8"));
    expect(summary).toMatchObject({seed: 42, summary: {strategy: "LOAD_PRIORITY", duration_days: 1}});

    const writtenConfig: unknown = JSON.parse(await readFile(join(output, "config.json"), "utf-8"));
    expect(writtenConfig).toMatchObject({simulation: {random_seed: 42, actual_seed_used: 42}});
  });
});
