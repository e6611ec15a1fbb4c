import { z } from "zod";

const optionalMeasurement = z.number().finite().min(0).nullable().optional();

export const ingestReadingSchema = z.object({
  ts: z.string().datetime({ offset: true }).pipe(z.coerce.date()),
  power_w: optionalMeasurement,
  voltage_v: optionalMeasurement,
  current_a: optionalMeasurement,
  energy_wh: optionalMeasurement,
  source: z.string().trim().min(1).max(64).default("device")
});
