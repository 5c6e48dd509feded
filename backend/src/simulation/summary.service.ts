import { Injectable } from "@nestjs/common";
import type { RunStatistics } from "@gridtwin/domain";

const fixed = (value: number, digits = 2): string => value.toFixed(digits);

@Injectable()
export class SummaryService {
  toSummaryLines(result: RunStatistics): string[] {
    const {summary, financial, battery, reliability} = result;
    return [
      `Strategy: ${summary.strategy} | Season: ${summary.season} | Days: ${summary.duration_days} | Seed: ${result.seed}`,
      `Energy: solar ${fixed(summary.total_solar_generated_kwh)} kWh, load ${fixed(summary.total_load_consumed_kwh)} kWh, ` +
      `import ${fixed(summary.total_grid_imported_kwh)} kWh, export ${fixed(summary.total_grid_exported_kwh)} kWh, ` +
      `curtailed ${fixed(summary.total_curtailed_kwh)} kWh`,
      `Financial: import cost ${fixed(financial.total_import_cost)}, export revenue ${fixed(financial.total_export_revenue)}, ` +
      `net cost ${fixed(financial.net_cost)}`,
      `Battery: ${battery.count} x unit, ${fixed(battery.capacity_kwh, 1)} kWh total, average SoC ${fixed(battery.average_soc_percent, 1)}%, ` +
      `final SoC ${fixed(battery.final_soc_percent, 1)}%, full ${battery.times_full} steps, empty ${battery.times_empty} steps`,
      `Performance: self-sufficiency ${fixed(summary.self_sufficiency_percent, 1)}%, inverter failures ${reliability.inverter_failures}, ` +
      `downtime ${fixed(reliability.inverter_downtime_hours, 1)} h, grid-served load ${fixed(reliability.total_unmet_load_kwh)} kWh`,
    ];
  }
}
