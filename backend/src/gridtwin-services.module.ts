import { Module } from "@nestjs/common";

import { ConfigFileService } from "./config/config-file.service";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { SimulationConfigFactory } from "./config/simulation-config.factory";
import { ResultExportService } from "./export/result-export.service";
import { ComparisonService } from "./simulation/comparison.service";
import { SimulationService } from "./simulation/simulation.service";
import { SummaryService } from "./simulation/summary.service";
import { StorageModule } from "./storage/storage.module";

@Module({
  imports: [StorageModule],
  providers: [
    SimulationService,
    SummaryService,
    ComparisonService,
    ConfigFileService,
    SimulationConfigFactory,
    RuntimeConfigService,
    ResultExportService,
  ],
  exports: [
    SimulationService,
    SummaryService,
    ComparisonService,
    ConfigFileService,
    SimulationConfigFactory,
    RuntimeConfigService,
    ResultExportService,
  ],
})
export class GridTwinServicesModule {}
