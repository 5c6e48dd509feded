export { Power } from "./power";
export { Energy } from "./energy";
export { Duration } from "./duration";
export { Scalar } from "./scalar";
export { Percentage } from "./percentage";
export { MAX_SEED, RandomSource, SeededRandom, generateSeed } from "./random";
export { ConfigurationError, describeError } from "./errors";
export {
  DispatchStrategy,
  Season,
  daySummarySchema,
  energyFlowsSchema,
  runStatisticsSchema,
  simulationEventSchema,
  stepRecordSchema,
} from "./simulation";
export type {
  DaySummary,
  EnergyFlows,
  RunResult,
  RunStatistics,
  SimulationConfig,
  SimulationEvent,
  StepRecord,
} from "./simulation";
