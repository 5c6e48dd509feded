import { ConfigurationError, RandomSource, Season } from "@gridtwin/domain";

export enum CloudLevel {
  Clear = "clear",
  Partly = "partly_cloudy",
  Mostly = "mostly_cloudy",
  Overcast = "overcast",
}

interface CoverageRange {
  min: number;
  max: number;
}

const LEVELS: readonly CloudLevel[] = [CloudLevel.Clear, CloudLevel.Partly, CloudLevel.Mostly, CloudLevel.Overcast];

const LEVEL_RANGES: Record<CloudLevel, CoverageRange> = {
  [CloudLevel.Clear]: {min: 0.0, max: 0.2},
  [CloudLevel.Partly]: {min: 0.2, max: 0.6},
  [CloudLevel.Mostly]: {min: 0.6, max: 0.8},
  [CloudLevel.Overcast]: {min: 0.8, max: 0.9},
};

// Weights follow the LEVELS order.
const SEASON_WEIGHTS: Record<Season, readonly number[]> = {
  [Season.Spring]: [0.1, 0.3, 0.4, 0.2],
  [Season.Summer]: [0.05, 0.15, 0.3, 0.5],
  [Season.Fall]: [0.2, 0.4, 0.3, 0.1],
  [Season.Winter]: [0.3, 0.4, 0.2, 0.1],
};

const KNOWN_SEASONS: readonly string[] = Object.values(Season);

function isSeason(value: string): value is Season {
  return KNOWN_SEASONS.includes(value);
}

export function parseSeason(value: string): Season {
  const normalized = value.trim().toLowerCase();
  if (!isSeason(normalized)) {
    throw new ConfigurationError(`Unknown season "${value}"; expected one of ${KNOWN_SEASONS.join(", ")}`);
  }
  return normalized;
}

export interface CoverageDraw {
  level: CloudLevel;
  coverage: number;
}

/** Daily cloud cover: a categorical weather level, then a uniform fraction inside that level's band. */
export class CloudCoverage {
  readonly season: Season;

  constructor(season: string, private readonly random: RandomSource) {
    this.season = parseSeason(season);
  }

  draw(): CoverageDraw {
    const level = LEVELS[this.random.weightedIndex(SEASON_WEIGHTS[this.season])];
    const range = LEVEL_RANGES[level];
    return {level, coverage: this.random.uniform(range.min, range.max)};
  }

  getDailyCoverage(): number {
    return this.draw().coverage;
  }
}
