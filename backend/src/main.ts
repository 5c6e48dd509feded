#!/usr/bin/env node
import "reflect-metadata";

import { Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { INestApplicationContext } from "@nestjs/common";

import { describeError } from "@gridtwin/domain";
import type { SimulationConfig } from "@gridtwin/domain";
import { AppModule } from "./app.module";
import { parseCliOptions } from "./cli-options";
import { ConfigFileService } from "./config/config-file.service";
import { resolveLogLevels } from "./config/log-levels";
import { setRuntimeConfig } from "./config/runtime-config";
import { RuntimeConfigService } from "./config/runtime-config.service";
import type { ConfigDocument } from "./config/schemas";
import { SimulationConfigFactory } from "./config/simulation-config.factory";
import { ResultExportService } from "./export/result-export.service";
import { ComparisonService } from "./simulation/comparison.service";
import type { ComparisonReport } from "./simulation/comparison.service";
import { SimulationService } from "./simulation/simulation.service";
import { SummaryService } from "./simulation/summary.service";
import { StorageService } from "./storage/storage.service";

async function bootstrap(argv: string[] = process.argv.slice(2)): Promise<void> {
  const cli = parseCliOptions(argv);
  const initialConfig = await configureGlobalLogging();
  setRuntimeConfig(initialConfig);

  const app = await NestFactory.createApplicationContext(AppModule, {bufferLogs: true});
  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();

  try {
    const factory = app.get(SimulationConfigFactory);
    const document = factory.withOverrides(app.get(RuntimeConfigService).getDocument(), cli.overrides);
    const config = factory.create(document);
    if (cli.compare) {
      runComparisons(app, config);
    } else {
      await runSingle(app, document, config);
    }
  } finally {
    await app.close();
  }
}

async function runSingle(
  app: INestApplicationContext,
  document: ConfigDocument,
  config: SimulationConfig,
): Promise<void> {
  const logger = new Logger("gridtwin");
  const result = app.get(SimulationService).run(config);
  for (const line of app.get(SummaryService).toSummaryLines(result)) {
    logger.log(line);
  }

  if (document.storage?.enabled ?? true) {
    const runId = app.get(StorageService).saveRun(result, config);
    logger.log(`Run persisted with id ${runId}`);
  } else {
    logger.verbose("Storage disabled; run not persisted.");
  }

  if (document.output?.enabled ?? true) {
    const directory = document.output?.directory ?? "results";
    await app.get(ResultExportService).exportRun(result, config, directory);
  } else {
    logger.verbose("Export disabled; no result files written.");
  }
}

function runComparisons(app: INestApplicationContext, config: SimulationConfig): void {
  const {strategies, seasons} = app.get(ComparisonService).compareAll(config);
  logReport("Strategy comparison", strategies);
  logReport("Season comparison", seasons);
}

function logReport(title: string, report: ComparisonReport): void {
  const logger = new Logger("gridtwin");
  logger.log(`${title} (seed ${report.seed})`);
  for (const {label, statistics} of report.variants) {
    logger.log(
      `  ${label}: self-sufficiency ${statistics.summary.self_sufficiency_percent.toFixed(1)}%, ` +
      `net cost ${statistics.financial.net_cost.toFixed(2)}, curtailed ${statistics.summary.total_curtailed_kwh.toFixed(2)} kWh`,
    );
  }
  logger.log(`  Lowest net cost: ${report.bestByNetCost}; highest self-sufficiency: ${report.bestBySelfSufficiency}`);
}

async function configureGlobalLogging(): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let levels: LogLevel[] = ["fatal", "error", "warn", "log"];
  let normalizedLevel = "info";
  let document: ConfigDocument;

  try {
    document = await configFileService.loadDocument(configFileService.resolvePath());
    const rawLevel = document.logging?.level ?? "info";
    const {levels: resolvedLevels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
    levels = resolvedLevels;
    normalizedLevel = normalized;
    if (fallbackUsed) {
      bootstrapLogger.warn(`Unknown logging.level value '${rawLevel}'; defaulting to INFO`);
    }
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration: ${describeError(error)}`);
    throw error;
  }

  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalizedLevel.toUpperCase()}`);
  return document;
}

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((error: unknown) => {
    new Logger("gridtwin").error(`Simulation aborted: ${describeError(error)}`);
    process.exitCode = 1;
  });
}

export { bootstrap };
