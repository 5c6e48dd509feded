import { z } from "zod";

export enum DispatchStrategy {
  LoadPriority = "LOAD_PRIORITY",
  ChargePriority = "CHARGE_PRIORITY",
  ProducePriority = "PRODUCE_PRIORITY",
}

export enum Season {
  Spring = "spring",
  Summer = "summer",
  Fall = "fall",
  Winter = "winter",
}

/**
 * Resolved run configuration. Capacities are already aggregated over unit
 * counts; `season` and `strategy` stay raw strings and are checked by the
 * component that consumes them.
 */
export interface SimulationConfig {
  simulation: {
    duration_days: number;
    time_step_minutes: number;
    season: string;
    start_date: string;
    random_seed: number | null;
  };
  battery: {
    capacity_kwh: number;
    efficiency: number;
    min_soc: number;
    count: number;
  };
  solar: {
    peak_power_kw: number;
    count: number;
  };
  inverter: {
    max_output_kw: number;
    failure_rate: number;
    min_failure_duration_hours: number;
    max_failure_duration_hours: number;
    count: number;
  };
  load: {
    base_load_kw: number;
    peak_hours_max_kw: number;
    peak_hours_start: number;
    peak_hours_end: number;
  };
  grid: {
    import_cost_per_kwh: number;
    export_revenue_per_kwh: number;
    export_limit_kw: number;
  };
  energy_management: {
    strategy: string;
  };
}

export const energyFlowsSchema = z.object({
  solar_to_load: z.number(),
  solar_to_battery: z.number(),
  solar_to_grid: z.number(),
  battery_to_load: z.number(),
  grid_to_load: z.number(),
  unmet_load: z.number(),
  curtailed: z.number(),
});

/** Average power (kW) of every flow during one step. */
export type EnergyFlows = z.infer<typeof energyFlowsSchema>;

export const stepRecordSchema = energyFlowsSchema.extend({
  timestamp: z.string(),
  step: z.number().int(),
  hour: z.number(),
  solar_available_kw: z.number(),
  solar_generated_kw: z.number(),
  load_demand_kw: z.number(),
  cloud_coverage: z.number(),
  battery_soc: z.number(),
  inverter_operational: z.boolean(),
});

export type StepRecord = z.infer<typeof stepRecordSchema>;

export const daySummarySchema = z.object({
  day: z.number().int(),
  solar_generated_kwh: z.number(),
  load_consumed_kwh: z.number(),
  grid_imported_kwh: z.number(),
  grid_exported_kwh: z.number(),
  curtailed_kwh: z.number(),
  battery_soc_end: z.number(),
  self_sufficiency_percent: z.number(),
});

export type DaySummary = z.infer<typeof daySummarySchema>;

export const simulationEventSchema = z.object({
  timestamp: z.string(),
  message: z.string(),
});

export type SimulationEvent = z.infer<typeof simulationEventSchema>;

export const runStatisticsSchema = z.object({
  seed: z.number().int(),
  summary: z.object({
    duration_days: z.number(),
    season: z.string(),
    strategy: z.string(),
    total_solar_generated_kwh: z.number(),
    total_load_consumed_kwh: z.number(),
    total_grid_imported_kwh: z.number(),
    total_grid_exported_kwh: z.number(),
    total_curtailed_kwh: z.number(),
    self_sufficiency_percent: z.number(),
  }),
  financial: z.object({
    total_import_cost: z.number(),
    total_export_revenue: z.number(),
    net_cost: z.number(),
    net_balance: z.number(),
  }),
  battery: z.object({
    average_soc_percent: z.number(),
    final_soc_percent: z.number(),
    capacity_kwh: z.number(),
    count: z.number().int(),
    times_full: z.number().int(),
    times_empty: z.number().int(),
  }),
  reliability: z.object({
    inverter_failures: z.number().int(),
    inverter_downtime_hours: z.number(),
    total_unmet_load_kwh: z.number(),
    hours_with_unmet_load: z.number(),
    unmet_load_percentage: z.number(),
  }),
  system: z.object({
    battery_count: z.number().int(),
    solar_panel_count: z.number().int(),
    inverter_count: z.number().int(),
  }),
});

export type RunStatistics = z.infer<typeof runStatisticsSchema>;

export interface RunResult extends RunStatistics {
  steps: StepRecord[];
  days: DaySummary[];
  events: SimulationEvent[];
}
