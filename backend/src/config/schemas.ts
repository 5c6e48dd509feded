import { z } from "zod";

import { ConfigurationError, MAX_SEED } from "@gridtwin/domain";

const MINUTES_PER_DAY = 24 * 60;

function isCalendarDate(value: string): boolean {
  const [year, month, day] = value.split("-").map(Number);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  return parsed.getUTCFullYear() === year && parsed.getUTCMonth() === month - 1 && parsed.getUTCDate() === day;
}

const hourOfDaySchema = z.number().int().min(0).max(24);
const unitCountSchema = z.number().int().positive().default(1);

const simulationSectionSchema = z.object({
  duration_days: z.number().int().positive(),
  time_step_minutes: z.number().int().positive().refine(
    (value) => MINUTES_PER_DAY % value === 0,
    {message: `must divide ${MINUTES_PER_DAY} minutes evenly`},
  ),
  season: z.string().min(1),
  start_date: z.string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .refine(isCalendarDate, {message: "no such calendar day"}),
  random_seed: z.number().int().nonnegative().max(MAX_SEED).nullable().optional(),
});

const batterySectionSchema = z.object({
  unit_capacity_kwh: z.number().positive(),
  efficiency: z.number().gt(0).max(1),
  min_soc: z.number().min(0).max(1),
  count: unitCountSchema,
});

const solarSectionSchema = z.object({
  unit_peak_power_kw: z.number().nonnegative(),
  count: unitCountSchema,
});

const inverterSectionSchema = z.object({
  unit_max_output_kw: z.number().nonnegative(),
  failure_rate: z.number().min(0).max(1),
  min_failure_duration_hours: z.number().int().positive(),
  max_failure_duration_hours: z.number().int().positive(),
  count: unitCountSchema,
}).refine(
  (section) => section.min_failure_duration_hours <= section.max_failure_duration_hours,
  {message: "must not exceed max_failure_duration_hours", path: ["min_failure_duration_hours"]},
);

const loadSectionSchema = z.object({
  base_load_kw: z.number().nonnegative(),
  peak_hours_max_kw: z.number().min(1),
  peak_hours_start: hourOfDaySchema,
  peak_hours_end: hourOfDaySchema,
});

const gridSectionSchema = z.object({
  import_cost_per_kwh: z.number().nonnegative(),
  export_revenue_per_kwh: z.number().nonnegative(),
  export_limit_kw: z.number().nonnegative(),
});

export const configDocumentSchema = z.object({
  simulation: simulationSectionSchema,
  battery: batterySectionSchema,
  solar: solarSectionSchema,
  inverter: inverterSectionSchema,
  load: loadSectionSchema,
  grid: gridSectionSchema,
  energy_management: z.object({
    strategy: z.string().min(1),
  }),
  logging: z.object({
    level: z.string().optional(),
  }).optional(),
  storage: z.object({
    enabled: z.boolean().default(true),
  }).optional(),
  output: z.object({
    enabled: z.boolean().default(true),
    directory: z.string().min(1).default("results"),
  }).optional(),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  const result = configDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration document: ${issues}`);
  }
  return result.data;
}
