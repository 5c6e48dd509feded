import { describe, expect, it } from "vitest";

import { ConfigurationError, DispatchStrategy, SeededRandom } from "@gridtwin/domain";
import type { RunResult, SimulationConfig } from "@gridtwin/domain";
import { SimulationEngine, TickKind, formatTimestamp } from "../src/simulation/simulation-engine";
import { buildConfig } from "./support/fixtures";

function runWith(config: SimulationConfig, seed = 42): RunResult {
  return new SimulationEngine(config, new SeededRandom(seed), seed).run();
}

describe("formatTimestamp", () => {
  it("renders a naive date-time", () => {
    expect(formatTimestamp(Date.UTC(2024, 5, 1, 13, 45, 0))).toBe("2024-06-01 13:45:00");
  });
});

describe("SimulationEngine", () => {
  it("derives time from the absolute step index", () => {
    const result = runWith(buildConfig({simulation: {time_step_minutes: 15}}));

    expect(result.steps).toHaveLength(2 * 96);
    expect(result.steps[0].timestamp).toBe("2024-06-01 00:00:00");
    expect(result.steps[53].hour).toBe(13.25);
    expect(result.steps[100].timestamp).toBe("2024-06-02 01:00:00");
    expect(result.steps[100].hour).toBe(1);
  });

  it("summarizes every complete day", () => {
    const result = runWith(buildConfig());

    expect(result.days.map((day) => day.day)).toEqual([1, 2]);
    const dayOneLoad = result.steps.slice(0, 24).reduce((sum, step) => sum + step.load_demand_kw, 0);
    expect(result.days[0].load_consumed_kwh).toBeCloseTo(dayOneLoad, 9);
    expect(result.days[0].battery_soc_end).toBe(result.steps[23].battery_soc);
  });

  it("keeps one cloud coverage value per day", () => {
    const result = runWith(buildConfig({simulation: {duration_days: 3}}));

    for (const day of [0, 1, 2]) {
      const values = new Set(result.steps.slice(day * 24, day * 24 + 24).map((step) => step.cloud_coverage));
      expect(values.size).toBe(1);
    }
  });

  it("produces no solar at night", () => {
    const result = runWith(buildConfig());
    for (const step of result.steps.filter((record) => record.hour < 6 || record.hour >= 18)) {
      expect(step.solar_available_kw).toBe(0);
      expect(step.solar_to_load + step.solar_to_battery + step.solar_to_grid).toBe(0);
    }
  });

  it("is reproducible for a fixed seed", () => {
    const config = buildConfig({inverter: {failure_rate: 0.3}});
    expect(runWith(config, 99)).toEqual(runWith(config, 99));
  });

  it("shares weather and load draws across strategies", () => {
    const config = buildConfig({simulation: {duration_days: 5}, inverter: {failure_rate: 0.2}});
    const columns = (result: RunResult) => result.steps.map((step) => [
      step.solar_available_kw,
      step.cloud_coverage,
      step.load_demand_kw,
      step.inverter_operational,
    ]);

    const baseline = columns(runWith(config, 7));
    for (const strategy of [DispatchStrategy.ChargePriority, DispatchStrategy.ProducePriority]) {
      const variant = runWith({...config, energy_management: {strategy}}, 7);
      expect(columns(variant)).toEqual(baseline);
    }
  });

  it("logs inverter failures and recoveries at their transitions", () => {
    const config = buildConfig({
      simulation: {duration_days: 3},
      inverter: {failure_rate: 1, min_failure_duration_hours: 5, max_failure_duration_hours: 5},
    });
    const result = runWith(config);

    expect(result.events).toEqual([
      {timestamp: "2024-06-01 23:00:00", message: "Inverter FAILURE (remaining: 5h)"},
      {timestamp: "2024-06-02 04:00:00", message: "Inverter RESTORED"},
      {timestamp: "2024-06-02 23:00:00", message: "Inverter FAILURE (remaining: 5h)"},
      {timestamp: "2024-06-03 04:00:00", message: "Inverter RESTORED"},
      {timestamp: "2024-06-03 23:00:00", message: "Inverter FAILURE (remaining: 5h)"},
    ]);
    expect(result.reliability.inverter_failures).toBe(3);
    expect(result.reliability.inverter_downtime_hours).toBe(10);
    const down = result.steps.filter((step) => !step.inverter_operational).map((step) => step.step);
    expect(down).toEqual([24, 25, 26, 27, 28, 48, 49, 50, 51, 52]);
    for (const step of result.steps.filter((record) => !record.inverter_operational)) {
      expect(step.solar_generated_kw).toBe(0);
    }
  });

  it("aggregates financials from the grid ledger", () => {
    const result = runWith(buildConfig({simulation: {duration_days: 4}}));
    const {financial, summary} = result;

    expect(financial.net_cost).toBeCloseTo(financial.total_import_cost - financial.total_export_revenue, 9);
    expect(financial.net_balance).toBeCloseTo(-financial.net_cost, 9);
    expect(financial.total_import_cost).toBeCloseTo(summary.total_grid_imported_kwh * 0.3, 4);
    expect(financial.total_export_revenue).toBeCloseTo(summary.total_grid_exported_kwh * 0.08, 4);
    expect(summary.self_sufficiency_percent).toBeGreaterThanOrEqual(0);
    expect(summary.self_sufficiency_percent).toBeLessThanOrEqual(100);
  });

  it("reports unmet load as grid-served steps", () => {
    const result = runWith(buildConfig());
    const unmetSteps = result.steps.filter((step) => step.unmet_load > 0).length;

    expect(result.reliability.hours_with_unmet_load).toBe(unmetSteps);
    expect(result.reliability.unmet_load_percentage).toBeCloseTo((unmetSteps / 48) * 100, 9);
    expect(result.summary.strategy).toBe("LOAD_PRIORITY");
    expect(result.summary.season).toBe("summer");
    expect(result.seed).toBe(42);
  });

  it("summarizes a trailing partial day", () => {
    const result = runWith(buildConfig({simulation: {duration_days: 1.5}}));

    expect(result.steps).toHaveLength(36);
    expect(result.days.map((day) => day.day)).toEqual([1, 2]);
  });

  it("emits a day boundary tick after each day of steps", () => {
    const engine = new SimulationEngine(buildConfig({simulation: {duration_days: 1}}), new SeededRandom(1), 1);
    const kinds = [...engine.ticks()].map((tick) => tick.kind);

    expect(kinds).toHaveLength(25);
    expect(kinds[23]).toBe(TickKind.Step);
    expect(kinds[24]).toBe(TickKind.DayBoundary);
    expect(() => engine.run()).toThrow("already been run");
  });

  it("rejects configurations the models cannot run", () => {
    const random = new SeededRandom(1);
    expect(() => new SimulationEngine(buildConfig({energy_management: {strategy: "NOPE"}}), random, 1))
      .toThrow(ConfigurationError);
    expect(() => new SimulationEngine(buildConfig({simulation: {season: "monsoon"}}), random, 1))
      .toThrow(ConfigurationError);
    expect(() => new SimulationEngine(buildConfig({simulation: {time_step_minutes: 7}}), random, 1))
      .toThrow(ConfigurationError);
    expect(() => new SimulationEngine(buildConfig({simulation: {start_date: "2024-02-31"}}), random, 1))
      .toThrow("no such calendar day");
  });

  it("starts the clock at midnight of a leap day", () => {
    const result = runWith(buildConfig({simulation: {start_date: "2024-02-29", duration_days: 1}}));

    expect(result.steps[0].timestamp).toBe("2024-02-29 00:00:00");
    expect(result.steps[23].timestamp).toBe("2024-02-29 23:00:00");
  });
});
