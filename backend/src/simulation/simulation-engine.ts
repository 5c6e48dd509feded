import { ConfigurationError, Duration, RandomSource } from "@gridtwin/domain";
import type { DaySummary, RunResult, SimulationConfig, SimulationEvent, StepRecord } from "@gridtwin/domain";
import { Battery } from "./battery";
import { CloudCoverage } from "./cloud-coverage";
import { EnergyManagementSystem } from "./energy-management";
import { Grid } from "./grid";
import { Inverter } from "./inverter";
import { Load } from "./load";
import { SolarPanel } from "./solar-panel";

const MINUTES_PER_DAY = 24 * 60;
const FULL_SOC_PERCENT = 99.9;
const EMPTY_SOC_MARGIN_PERCENT = 0.1;

export enum TickKind {
  Step = "step",
  DayBoundary = "day_boundary",
}

export type SimulationTick =
  | { kind: TickKind.Step; record: StepRecord }
  | { kind: TickKind.DayBoundary; summary: DaySummary };

export interface EngineListener {
  onDayCompleted?(summary: DaySummary, totalDays: number): void;
  onEvent?(event: SimulationEvent): void;
}

interface DailyTotals {
  steps: number;
  solarKwh: number;
  loadKwh: number;
  importKwh: number;
  exportKwh: number;
  curtailedKwh: number;
}

function emptyTotals(): DailyTotals {
  return {steps: 0, solarKwh: 0, loadKwh: 0, importKwh: 0, exportKwh: 0, curtailedKwh: 0};
}

function parseStartDate(value: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid start date "${value}"; expected YYYY-MM-DD`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const epoch = Date.UTC(year, month - 1, day);
  const parsed = new Date(epoch);
  // Date.UTC rolls 2024-02-31 over into March instead of failing.
  if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
    throw new ConfigurationError(`Invalid start date "${value}"; no such calendar day`);
  }
  return epoch;
}

export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 19).replace("T", " ");
}

function selfSufficiency(importKwh: number, loadKwh: number): number {
  return loadKwh > 0 ? (1 - importKwh / loadKwh) * 100 : 0;
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((total, item) => total + pick(item), 0);
}

/**
 * Fixed-step run of one household. Time is always derived from the absolute
 * step index. Day boundaries are explicit ticks: they close the daily
 * accumulators, roll the inverter failure check once and redraw the clouds.
 */
export class SimulationEngine {
  private readonly battery: Battery;
  private readonly inverter: Inverter;
  private readonly solarPanel: SolarPanel;
  private readonly load: Load;
  private readonly cloudCoverage: CloudCoverage;
  private readonly grid: Grid;
  private readonly ems: EnergyManagementSystem;

  private readonly step: Duration;
  private readonly stepsPerDay: number;
  private readonly totalSteps: number;
  private readonly startEpochMs: number;

  private currentCloudCoverage: number;
  private readonly events: SimulationEvent[] = [];
  private failureCount = 0;
  private consumed = false;

  constructor(
    private readonly config: SimulationConfig,
    random: RandomSource,
    readonly seed: number,
    private readonly listener: EngineListener = {},
  ) {
    const stepMinutes = config.simulation.time_step_minutes;
    if (!Number.isInteger(stepMinutes) || stepMinutes <= 0 || MINUTES_PER_DAY % stepMinutes !== 0) {
      throw new ConfigurationError(`time_step_minutes must be a positive divisor of ${MINUTES_PER_DAY}`);
    }
    this.step = Duration.fromMinutes(stepMinutes);
    this.stepsPerDay = MINUTES_PER_DAY / stepMinutes;
    this.totalSteps = Math.floor((config.simulation.duration_days * MINUTES_PER_DAY) / stepMinutes);
    this.startEpochMs = parseStartDate(config.simulation.start_date);

    this.cloudCoverage = new CloudCoverage(config.simulation.season, random);
    this.ems = new EnergyManagementSystem(config.energy_management.strategy);
    this.battery = new Battery({
      capacityKwh: config.battery.capacity_kwh,
      efficiency: config.battery.efficiency,
      minSoc: config.battery.min_soc,
    });
    this.inverter = new Inverter({
      maxOutputKw: config.inverter.max_output_kw,
      failureRate: config.inverter.failure_rate,
      minFailureDurationHours: config.inverter.min_failure_duration_hours,
      maxFailureDurationHours: config.inverter.max_failure_duration_hours,
    }, random);
    this.solarPanel = new SolarPanel(config.solar.peak_power_kw);
    this.load = new Load({
      baseLoadKw: config.load.base_load_kw,
      peakHoursMaxKw: config.load.peak_hours_max_kw,
      peakHoursStart: config.load.peak_hours_start,
      peakHoursEnd: config.load.peak_hours_end,
    }, random);
    this.grid = new Grid({
      importCostPerKwh: config.grid.import_cost_per_kwh,
      exportRevenuePerKwh: config.grid.export_revenue_per_kwh,
      exportLimitKw: config.grid.export_limit_kw,
    });

    this.currentCloudCoverage = this.cloudCoverage.getDailyCoverage();
  }

  /** Single-use: the models carry state, so a second pass would continue the first. */
  *ticks(): Generator<SimulationTick> {
    if (this.consumed) {
      throw new Error("SimulationEngine has already been run");
    }
    this.consumed = true;

    const stepMinutes = this.step.minutes;
    const stepHours = this.step.hours;
    let daily = emptyTotals();
    let day = 0;

    for (let index = 0; index < this.totalSteps; index += 1) {
      const minuteOfDay = (index * stepMinutes) % MINUTES_PER_DAY;
      const hour = minuteOfDay / 60;
      const timestamp = formatTimestamp(this.startEpochMs + index * this.step.milliseconds);

      const solarAvailable = this.solarPanel.generate(hour, this.currentCloudCoverage);
      const solarGenerated = this.inverter.applyLimit(solarAvailable);
      const loadDemand = this.load.generate(hour);
      const flows = this.ems.distributeEnergy(solarGenerated, loadDemand, this.battery, this.grid, this.step);

      const record: StepRecord = {
        timestamp,
        step: index,
        hour,
        solar_available_kw: solarAvailable.kilowatts,
        solar_generated_kw: solarGenerated.kilowatts,
        load_demand_kw: loadDemand.kilowatts,
        cloud_coverage: this.currentCloudCoverage,
        battery_soc: this.battery.getSoc(),
        ...flows,
        inverter_operational: this.inverter.isOperational(),
      };

      daily.steps += 1;
      daily.solarKwh += (flows.solar_to_load + flows.solar_to_battery + flows.solar_to_grid) * stepHours;
      daily.loadKwh += loadDemand.kilowatts * stepHours;
      daily.importKwh += flows.grid_to_load * stepHours;
      daily.exportKwh += flows.solar_to_grid * stepHours;
      daily.curtailedKwh += flows.curtailed * stepHours;

      yield {kind: TickKind.Step, record};

      if (this.inverter.update(this.step)) {
        this.recordEvent(timestamp, "Inverter RESTORED");
      }

      if ((index + 1) % this.stepsPerDay === 0) {
        day += 1;
        const summary = this.summarizeDay(day, daily);
        daily = emptyTotals();
        this.listener.onDayCompleted?.(summary, this.config.simulation.duration_days);
        yield {kind: TickKind.DayBoundary, summary};

        if (this.inverter.checkFailure()) {
          this.failureCount += 1;
          this.recordEvent(timestamp, `Inverter FAILURE (remaining: ${this.inverter.failureHoursRemaining}h)`);
        }
        this.currentCloudCoverage = this.cloudCoverage.getDailyCoverage();
      }
    }

    if (daily.steps > 0) {
      const summary = this.summarizeDay(day + 1, daily);
      this.listener.onDayCompleted?.(summary, this.config.simulation.duration_days);
      yield {kind: TickKind.DayBoundary, summary};
    }
  }

  run(): RunResult {
    const steps: StepRecord[] = [];
    const days: DaySummary[] = [];
    for (const tick of this.ticks()) {
      if (tick.kind === TickKind.Step) {
        steps.push(tick.record);
      } else {
        days.push(tick.summary);
      }
    }
    return this.compile(steps, days);
  }

  private recordEvent(timestamp: string, message: string): void {
    const event: SimulationEvent = {timestamp, message};
    this.events.push(event);
    this.listener.onEvent?.(event);
  }

  private summarizeDay(day: number, totals: DailyTotals): DaySummary {
    return {
      day,
      solar_generated_kwh: totals.solarKwh,
      load_consumed_kwh: totals.loadKwh,
      grid_imported_kwh: totals.importKwh,
      grid_exported_kwh: totals.exportKwh,
      curtailed_kwh: totals.curtailedKwh,
      battery_soc_end: this.battery.getSoc(),
      self_sufficiency_percent: selfSufficiency(totals.importKwh, totals.loadKwh),
    };
  }

  private compile(steps: StepRecord[], days: DaySummary[]): RunResult {
    const stepHours = this.step.hours;
    const totalLoad = sum(days, (entry) => entry.load_consumed_kwh);
    const totalImport = sum(days, (entry) => entry.grid_imported_kwh);
    const emptyThreshold = this.config.battery.min_soc * 100 + EMPTY_SOC_MARGIN_PERCENT;
    const unmetHours = steps.filter((record) => record.unmet_load > 0).length * stepHours;
    const totalHours = steps.length * stepHours;
    const importCost = this.grid.totalImportCost;
    const exportRevenue = this.grid.totalExportRevenue;

    return {
      seed: this.seed,
      summary: {
        duration_days: this.config.simulation.duration_days,
        season: this.cloudCoverage.season,
        strategy: this.ems.strategy,
        total_solar_generated_kwh: sum(days, (entry) => entry.solar_generated_kwh),
        total_load_consumed_kwh: totalLoad,
        total_grid_imported_kwh: totalImport,
        total_grid_exported_kwh: sum(days, (entry) => entry.grid_exported_kwh),
        total_curtailed_kwh: sum(days, (entry) => entry.curtailed_kwh),
        self_sufficiency_percent: selfSufficiency(totalImport, totalLoad),
      },
      financial: {
        total_import_cost: importCost,
        total_export_revenue: exportRevenue,
        net_cost: importCost - exportRevenue,
        net_balance: this.grid.netBalance(),
      },
      battery: {
        average_soc_percent: steps.length > 0 ? sum(steps, (record) => record.battery_soc) / steps.length : 0,
        final_soc_percent: this.battery.getSoc(),
        capacity_kwh: this.battery.capacityKwh,
        count: this.config.battery.count,
        times_full: steps.filter((record) => record.battery_soc >= FULL_SOC_PERCENT).length,
        times_empty: steps.filter((record) => record.battery_soc <= emptyThreshold).length,
      },
      reliability: {
        inverter_failures: this.failureCount,
        inverter_downtime_hours: steps.filter((record) => !record.inverter_operational).length * stepHours,
        total_unmet_load_kwh: sum(steps, (record) => record.unmet_load) * stepHours,
        hours_with_unmet_load: unmetHours,
        unmet_load_percentage: totalHours > 0 ? (unmetHours / totalHours) * 100 : 0,
      },
      system: {
        battery_count: this.config.battery.count,
        solar_panel_count: this.config.solar.count,
        inverter_count: this.config.inverter.count,
      },
      steps,
      days,
      events: [...this.events],
    };
  }
}
