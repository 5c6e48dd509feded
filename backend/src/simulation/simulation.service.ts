import { Injectable, Logger } from "@nestjs/common";

import { generateSeed, SeededRandom } from "@gridtwin/domain";
import type { DaySummary, RunResult, SimulationConfig, SimulationEvent } from "@gridtwin/domain";
import { SimulationEngine } from "./simulation-engine";

const PROGRESS_INTERVAL_DAYS = 5;

export interface RunOptions {
  /** Suppresses per-day progress output, e.g. inside comparison batches. */
  quiet?: boolean;
}

@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);

  resolveSeed(config: SimulationConfig): number {
    const configured = config.simulation.random_seed;
    if (configured !== null) {
      return configured;
    }
    const seed = generateSeed();
    this.logger.warn(`No random_seed configured; generated seed ${seed}. Reuse it to reproduce this run.`);
    return seed;
  }

  run(config: SimulationConfig, options: RunOptions = {}): RunResult {
    const seed = this.resolveSeed(config);
    const engine = new SimulationEngine(config, new SeededRandom(seed), seed, {
      onDayCompleted: (summary: DaySummary, totalDays: number) => {
        if (!options.quiet && summary.day % PROGRESS_INTERVAL_DAYS === 0) {
          const percent = ((summary.day / totalDays) * 100).toFixed(1);
          this.logger.log(`Day ${summary.day}/${totalDays} completed (${percent}%)`);
        }
      },
      onEvent: (event: SimulationEvent) => {
        this.logger.verbose(`${event.timestamp} ${event.message}`);
      },
    });

    this.logger.log(
      `Running ${config.simulation.duration_days} day(s) at ${config.simulation.time_step_minutes} min steps: ` +
      `strategy=${config.energy_management.strategy}, season=${config.simulation.season}, seed=${seed}`,
    );
    const result = engine.run();
    this.logger.log(
      `Simulation complete: ${result.steps.length} steps, self-sufficiency ${result.summary.self_sufficiency_percent.toFixed(1)}%, ` +
      `net cost ${result.financial.net_cost.toFixed(2)}`,
    );
    return result;
  }
}
