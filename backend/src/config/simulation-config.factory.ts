import { Injectable } from "@nestjs/common";

import type { SimulationConfig } from "@gridtwin/domain";
import type { ConfigDocument } from "./schemas";
import { parseConfigDocument } from "./schemas";

export interface ConfigOverrides {
  strategy?: string;
  season?: string;
  durationDays?: number;
  seed?: number;
  startDate?: string;
  storageEnabled?: boolean;
  exportEnabled?: boolean;
}

@Injectable()
export class SimulationConfigFactory {
  /** Resolves the file layout (per-unit ratings and counts) into aggregate engine parameters. */
  create(config: ConfigDocument): SimulationConfig {
    const {simulation, battery, solar, inverter, load, grid} = config;
    return {
      simulation: {
        duration_days: simulation.duration_days,
        time_step_minutes: simulation.time_step_minutes,
        season: simulation.season,
        start_date: simulation.start_date,
        random_seed: simulation.random_seed ?? null,
      },
      battery: {
        capacity_kwh: battery.unit_capacity_kwh * battery.count,
        efficiency: battery.efficiency,
        min_soc: battery.min_soc,
        count: battery.count,
      },
      solar: {
        peak_power_kw: solar.unit_peak_power_kw * solar.count,
        count: solar.count,
      },
      inverter: {
        max_output_kw: inverter.unit_max_output_kw * inverter.count,
        failure_rate: inverter.failure_rate,
        min_failure_duration_hours: inverter.min_failure_duration_hours,
        max_failure_duration_hours: inverter.max_failure_duration_hours,
        count: inverter.count,
      },
      load: {...load},
      grid: {...grid},
      energy_management: {strategy: config.energy_management.strategy},
    };
  }

  /** Returns a new, re-validated document with the given overrides applied. */
  withOverrides(config: ConfigDocument, overrides: ConfigOverrides): ConfigDocument {
    const simulation = {...config.simulation};
    if (overrides.season !== undefined) {
      simulation.season = overrides.season;
    }
    if (overrides.durationDays !== undefined) {
      simulation.duration_days = overrides.durationDays;
    }
    if (overrides.seed !== undefined) {
      simulation.random_seed = overrides.seed;
    }
    if (overrides.startDate !== undefined) {
      simulation.start_date = overrides.startDate;
    }

    return parseConfigDocument({
      ...config,
      simulation,
      energy_management: {strategy: overrides.strategy ?? config.energy_management.strategy},
      storage: {...config.storage, enabled: overrides.storageEnabled ?? config.storage?.enabled ?? true},
      output: {
        directory: config.output?.directory ?? "results",
        enabled: overrides.exportEnabled ?? config.output?.enabled ?? true,
      },
    });
  }
}
