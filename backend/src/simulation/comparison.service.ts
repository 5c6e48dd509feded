import { Inject, Injectable, Logger } from "@nestjs/common";

import { DispatchStrategy, Season } from "@gridtwin/domain";
import type { RunResult, RunStatistics, SimulationConfig } from "@gridtwin/domain";
import { SimulationService } from "./simulation.service";

export const SEASON_START_DATES: Record<Season, string> = {
  [Season.Spring]: "2024-03-01",
  [Season.Summer]: "2024-06-01",
  [Season.Fall]: "2024-09-01",
  [Season.Winter]: "2024-12-01",
};

export interface ComparisonVariant {
  label: string;
  statistics: RunStatistics;
}

export interface ComparisonReport {
  seed: number;
  variants: ComparisonVariant[];
  bestByNetCost: string;
  bestBySelfSufficiency: string;
}

export interface ComparisonSuite {
  strategies: ComparisonReport;
  seasons: ComparisonReport;
}

function toStatistics(result: RunResult): RunStatistics {
  const {seed, summary, financial, battery, reliability, system} = result;
  return {seed, summary, financial, battery, reliability, system};
}

function pickBest(variants: ComparisonVariant[], score: (stats: RunStatistics) => number): string {
  let best = variants[0];
  for (const variant of variants.slice(1)) {
    if (score(variant.statistics) > score(best.statistics)) {
      best = variant;
    }
  }
  return best.label;
}

/**
 * Runs the same household through every strategy or every season with one
 * shared seed, so weather and load draws line up across the variants.
 */
@Injectable()
export class ComparisonService {
  private readonly logger = new Logger(ComparisonService.name);

  constructor(@Inject(SimulationService) private readonly simulationService: SimulationService) {
  }

  /** Both comparisons under a single seed, generated once when none is configured. */
  compareAll(config: SimulationConfig): ComparisonSuite {
    const seeded: SimulationConfig = {
      ...config,
      simulation: {...config.simulation, random_seed: this.simulationService.resolveSeed(config)},
    };
    return {
      strategies: this.compareStrategies(seeded),
      seasons: this.compareSeasons(seeded),
    };
  }

  compareStrategies(config: SimulationConfig): ComparisonReport {
    const seed = this.simulationService.resolveSeed(config);
    this.logger.log(`Comparing dispatch strategies with seed ${seed}`);
    const variants = Object.values(DispatchStrategy).map((strategy) => ({
      label: strategy,
      statistics: this.runVariant({
        ...config,
        simulation: {...config.simulation, random_seed: seed},
        energy_management: {strategy},
      }),
    }));
    return this.buildReport(seed, variants);
  }

  compareSeasons(config: SimulationConfig): ComparisonReport {
    const seed = this.simulationService.resolveSeed(config);
    this.logger.log(`Comparing seasons with seed ${seed}`);
    const variants = Object.values(Season).map((season) => ({
      label: season,
      statistics: this.runVariant({
        ...config,
        simulation: {...config.simulation, season, start_date: SEASON_START_DATES[season], random_seed: seed},
      }),
    }));
    return this.buildReport(seed, variants);
  }

  private runVariant(config: SimulationConfig): RunStatistics {
    return toStatistics(this.simulationService.run(config, {quiet: true}));
  }

  private buildReport(seed: number, variants: ComparisonVariant[]): ComparisonReport {
    const report: ComparisonReport = {
      seed,
      variants,
      bestByNetCost: pickBest(variants, (stats) => -stats.financial.net_cost),
      bestBySelfSufficiency: pickBest(variants, (stats) => stats.summary.self_sufficiency_percent),
    };
    this.logger.log(`Lowest net cost: ${report.bestByNetCost}; highest self-sufficiency: ${report.bestBySelfSufficiency}`);
    return report;
  }
}
