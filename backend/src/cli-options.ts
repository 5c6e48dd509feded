import { parseArgs } from "node:util";

import { ConfigurationError, MAX_SEED, describeError } from "@gridtwin/domain";
import type { ConfigOverrides } from "./config/simulation-config.factory";

export interface CliOptions {
  overrides: ConfigOverrides;
  compare: boolean;
}

function parseInteger(
  flag: string,
  value: string | undefined,
  minimum: number,
  maximum: number = Number.MAX_SAFE_INTEGER,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < minimum || parsed > maximum) {
    throw new ConfigurationError(`--${flag} expects an integer in [${minimum}, ${maximum}], got "${value}"`);
  }
  return parsed;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        strategy: {type: "string"},
        season: {type: "string"},
        days: {type: "string"},
        seed: {type: "string"},
        "start-date": {type: "string"},
        compare: {type: "boolean", default: false},
        "no-storage": {type: "boolean", default: false},
        "no-export": {type: "boolean", default: false},
      },
    });
  } catch (error) {
    throw new ConfigurationError(`Invalid command line: ${describeError(error)}`);
  }
}

export function parseCliOptions(argv: string[]): CliOptions {
  const {values} = readArgs(argv);
  const overrides: ConfigOverrides = {};
  if (values.strategy !== undefined) {
    overrides.strategy = values.strategy;
  }
  if (values.season !== undefined) {
    overrides.season = values.season;
  }
  if (values["start-date"] !== undefined) {
    overrides.startDate = values["start-date"];
  }
  const days = parseInteger("days", values.days, 1);
  if (days !== undefined) {
    overrides.durationDays = days;
  }
  const seed = parseInteger("seed", values.seed, 0, MAX_SEED);
  if (seed !== undefined) {
    overrides.seed = seed;
  }
  if (values["no-storage"] === true) {
    overrides.storageEnabled = false;
  }
  if (values["no-export"] === true) {
    overrides.exportEnabled = false;
  }

  return {overrides, compare: values.compare === true};
}
