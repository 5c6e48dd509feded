import { ConfigurationError, DispatchStrategy, Duration, Power } from "@gridtwin/domain";
import type { EnergyFlows } from "@gridtwin/domain";
import type { EnergyReservoir, GridConnection } from "./types";

const KNOWN_STRATEGIES: readonly string[] = Object.values(DispatchStrategy);

function isDispatchStrategy(value: string): value is DispatchStrategy {
  return KNOWN_STRATEGIES.includes(value);
}

export function parseDispatchStrategy(value: string): DispatchStrategy {
  const normalized = value.trim().toUpperCase();
  if (!isDispatchStrategy(normalized)) {
    throw new ConfigurationError(
      `Unknown energy management strategy "${value}"; expected one of ${KNOWN_STRATEGIES.join(", ")}`,
    );
  }
  return normalized;
}

export interface DispatchContext {
  solar: Power;
  load: Power;
  battery: EnergyReservoir;
  grid: GridConnection;
  step: Duration;
}

type DispatchPolicy = (context: DispatchContext) => EnergyFlows;

interface FlowAccumulator {
  solarToLoad: number;
  solarToBattery: number;
  solarToGrid: number;
  batteryToLoad: number;
  gridToLoad: number;
  curtailed: number;
}

function emptyFlows(): FlowAccumulator {
  return {solarToLoad: 0, solarToBattery: 0, solarToGrid: 0, batteryToLoad: 0, gridToLoad: 0, curtailed: 0};
}

function round6(value: number): number {
  return Math.round(Math.max(0, value) * 1e6) / 1e6;
}

function toFlows(flows: FlowAccumulator): EnergyFlows {
  return {
    solar_to_load: round6(flows.solarToLoad),
    solar_to_battery: round6(flows.solarToBattery),
    solar_to_grid: round6(flows.solarToGrid),
    battery_to_load: round6(flows.batteryToLoad),
    grid_to_load: round6(flows.gridToLoad),
    unmet_load: round6(flows.gridToLoad),
    curtailed: round6(flows.curtailed),
  };
}

// Battery and grid speak energy; the flows are average power over the step.
function chargeBattery(context: DispatchContext, offeredKw: number): number {
  if (offeredKw <= 0) {
    return 0;
  }
  const offered = Power.fromKilowatts(offeredKw).forDuration(context.step);
  return context.battery.charge(offered).per(context.step).kilowatts;
}

function dischargeBattery(context: DispatchContext, requestedKw: number): number {
  if (requestedKw <= 0) {
    return 0;
  }
  const requested = Power.fromKilowatts(requestedKw).forDuration(context.step);
  return context.battery.discharge(requested).per(context.step).kilowatts;
}

function exportSurplus(context: DispatchContext, flows: FlowAccumulator, surplusKw: number): void {
  if (surplusKw <= 0) {
    return;
  }
  const accepted = context.grid.exportEnergy(Power.fromKilowatts(surplusKw), context.step).kilowatts;
  flows.solarToGrid += accepted;
  flows.curtailed += surplusKw - accepted;
}

function importDeficit(context: DispatchContext, flows: FlowAccumulator, deficitKw: number): void {
  if (deficitKw <= 0) {
    return;
  }
  context.grid.importEnergy(Power.fromKilowatts(deficitKw), context.step);
  flows.gridToLoad += deficitKw;
}

/** Solar to the load, the battery covers what it can, the grid the rest. Shared deficit branch. */
function serveDeficit(context: DispatchContext, flows: FlowAccumulator, solarKw: number, loadKw: number): void {
  flows.solarToLoad += solarKw;
  const deficitKw = loadKw - solarKw;
  const deliveredKw = dischargeBattery(context, deficitKw);
  flows.batteryToLoad += deliveredKw;
  importDeficit(context, flows, deficitKw - deliveredKw);
}

const loadPriority: DispatchPolicy = (context) => {
  const flows = emptyFlows();
  const solarKw = context.solar.kilowatts;
  const loadKw = context.load.kilowatts;
  if (solarKw < loadKw) {
    serveDeficit(context, flows, solarKw, loadKw);
    return toFlows(flows);
  }
  flows.solarToLoad = loadKw;
  const excessKw = solarKw - loadKw;
  const consumedKw = chargeBattery(context, excessKw);
  flows.solarToBattery = consumedKw;
  exportSurplus(context, flows, excessKw - consumedKw);
  return toFlows(flows);
};

const chargePriority: DispatchPolicy = (context) => {
  const flows = emptyFlows();
  const solarKw = context.solar.kilowatts;
  const loadKw = context.load.kilowatts;
  if (solarKw < loadKw) {
    serveDeficit(context, flows, solarKw, loadKw);
    return toFlows(flows);
  }
  const consumedKw = chargeBattery(context, solarKw);
  flows.solarToBattery = consumedKw;
  const remainingKw = solarKw - consumedKw;
  if (remainingKw >= loadKw) {
    flows.solarToLoad = loadKw;
    exportSurplus(context, flows, remainingKw - loadKw);
  } else {
    // Charging already won; the battery is not drawn back down to cover the gap.
    flows.solarToLoad = remainingKw;
    importDeficit(context, flows, loadKw - remainingKw);
  }
  return toFlows(flows);
};

const producePriority: DispatchPolicy = (context) => {
  const flows = emptyFlows();
  const solarKw = context.solar.kilowatts;
  const loadKw = context.load.kilowatts;
  let remainingKw = solarKw;
  if (remainingKw > 0) {
    const exportedKw = context.grid.exportEnergy(context.solar, context.step).kilowatts;
    flows.solarToGrid = exportedKw;
    remainingKw -= exportedKw;
  }
  const consumedKw = chargeBattery(context, remainingKw);
  flows.solarToBattery = consumedKw;
  remainingKw -= consumedKw;

  flows.solarToLoad = Math.max(0, Math.min(remainingKw, loadKw));
  flows.curtailed = remainingKw - flows.solarToLoad;

  const deficitKw = loadKw - flows.solarToLoad;
  const deliveredKw = dischargeBattery(context, deficitKw);
  flows.batteryToLoad = deliveredKw;
  importDeficit(context, flows, deficitKw - deliveredKw);
  return toFlows(flows);
};

const POLICIES: Record<DispatchStrategy, DispatchPolicy> = {
  [DispatchStrategy.LoadPriority]: loadPriority,
  [DispatchStrategy.ChargePriority]: chargePriority,
  [DispatchStrategy.ProducePriority]: producePriority,
};

/**
 * Routes one step of solar production between load, battery and grid using the
 * ordering fixed at construction. All returned flows are kW averaged over the
 * step, non-negative and rounded to six decimals.
 */
export class EnergyManagementSystem {
  readonly strategy: DispatchStrategy;
  private readonly policy: DispatchPolicy;

  constructor(strategy: string) {
    this.strategy = parseDispatchStrategy(strategy);
    this.policy = POLICIES[this.strategy];
  }

  distributeEnergy(
    solar: Power,
    load: Power,
    battery: EnergyReservoir,
    grid: GridConnection,
    step: Duration,
  ): EnergyFlows {
    return this.policy({solar, load, battery, grid, step});
  }
}
