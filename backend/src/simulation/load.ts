import { Power, RandomSource } from "@gridtwin/domain";

export interface LoadOptions {
  baseLoadKw: number;
  peakHoursMaxKw: number;
  peakHoursStart: number;
  peakHoursEnd: number;
}

interface ScheduledEvent {
  hour: number;
  probability: number;
  minKw: number;
  maxKw: number;
}

const PEAK_MIN_KW = 1.0;
const NOISE_PROBABILITY = 0.3;
const NOISE_MAX_KW = 0.8;

// Household routines outside the evening peak.
const SCHEDULED_EVENTS: readonly ScheduledEvent[] = [
  {hour: 6, probability: 0.7, minKw: 1.0, maxKw: 1.5},
  {hour: 7, probability: 0.5, minKw: 0.8, maxKw: 1.2},
  {hour: 8, probability: 0.4, minKw: 0.8, maxKw: 1.2},
  {hour: 12, probability: 0.6, minKw: 1.0, maxKw: 1.5},
  {hour: 22, probability: 0.3, minKw: 0.5, maxKw: 1.0},
];

export class Load {
  constructor(
    private readonly options: LoadOptions,
    private readonly random: RandomSource,
  ) {
  }

  /**
   * Demand at `hour` (fractional hours are floored). Base load, plus either the
   * evening peak or any scheduled event for that hour, plus occasional noise.
   */
  generate(hour: number): Power {
    const hourOfDay = Math.floor(hour);
    let demandKw = this.options.baseLoadKw;

    if (this.options.peakHoursStart <= hourOfDay && hourOfDay < this.options.peakHoursEnd) {
      demandKw += this.random.uniform(PEAK_MIN_KW, this.options.peakHoursMaxKw);
    } else {
      for (const event of SCHEDULED_EVENTS) {
        if (event.hour === hourOfDay && this.random.chance(event.probability)) {
          demandKw += this.random.uniform(event.minKw, event.maxKw);
        }
      }
    }

    if (this.random.chance(NOISE_PROBABILITY)) {
      demandKw += this.random.uniform(0, NOISE_MAX_KW);
    }
    return Power.fromKilowatts(demandKw);
  }
}
