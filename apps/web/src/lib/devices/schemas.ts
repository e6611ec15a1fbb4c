import { z } from "zod";

const optionalLabel = z.string().trim().max(255).nullable().optional();

export const createDeviceSchema = z.object({
  name: z.string().trim().min(1).max(255),
  location: optionalLabel,
  model: optionalLabel,
  manufacturer: optionalLabel,
  serial_number: optionalLabel,
  external_device_id: optionalLabel,
  timezone: z.string().trim().min(1).default("UTC")
});

export const updateDeviceSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  location: optionalLabel,
  model: optionalLabel,
  manufacturer: optionalLabel,
  serial_number: optionalLabel,
  external_device_id: optionalLabel,
  timezone: z.string().trim().min(1).optional(),
  is_active: z.boolean().optional()
});
