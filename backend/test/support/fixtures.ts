import type { SimulationConfig } from "@gridtwin/domain";
import type { ConfigDocument } from "../../src/config/schemas";

type ConfigPatch = { [K in keyof SimulationConfig]?: Partial<SimulationConfig[K]> };

const baseConfig: SimulationConfig = {
  simulation: {
    duration_days: 2,
    time_step_minutes: 60,
    season: "summer",
    start_date: "2024-06-01",
    random_seed: 42,
  },
  battery: {capacity_kwh: 13.5, efficiency: 0.9, min_soc: 0.05, count: 1},
  solar: {peak_power_kw: 10, count: 1},
  inverter: {
    max_output_kw: 8,
    failure_rate: 0,
    min_failure_duration_hours: 4,
    max_failure_duration_hours: 72,
    count: 1,
  },
  load: {base_load_kw: 0.5, peak_hours_max_kw: 3, peak_hours_start: 17, peak_hours_end: 21},
  grid: {import_cost_per_kwh: 0.3, export_revenue_per_kwh: 0.08, export_limit_kw: 20},
  energy_management: {strategy: "LOAD_PRIORITY"},
};

export function buildConfig(patch: ConfigPatch = {}): SimulationConfig {
  return {
    simulation: {...baseConfig.simulation, ...patch.simulation},
    battery: {...baseConfig.battery, ...patch.battery},
    solar: {...baseConfig.solar, ...patch.solar},
    inverter: {...baseConfig.inverter, ...patch.inverter},
    load: {...baseConfig.load, ...patch.load},
    grid: {...baseConfig.grid, ...patch.grid},
    energy_management: {...baseConfig.energy_management, ...patch.energy_management},
  };
}

export function buildDocument(): ConfigDocument {
  return {
    simulation: {
      duration_days: 2,
      time_step_minutes: 60,
      season: "summer",
      start_date: "2024-06-01",
      random_seed: 42,
    },
    battery: {unit_capacity_kwh: 13.5, efficiency: 0.9, min_soc: 0.05, count: 2},
    solar: {unit_peak_power_kw: 5, count: 3},
    inverter: {
      unit_max_output_kw: 4,
      failure_rate: 0.005,
      min_failure_duration_hours: 4,
      max_failure_duration_hours: 72,
      count: 2,
    },
    load: {base_load_kw: 0.5, peak_hours_max_kw: 3, peak_hours_start: 17, peak_hours_end: 21},
    grid: {import_cost_per_kwh: 0.3, export_revenue_per_kwh: 0.08, export_limit_kw: 20},
    energy_management: {strategy: "LOAD_PRIORITY"},
  };
}
