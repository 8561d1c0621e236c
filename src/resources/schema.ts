import { z } from "zod";

export const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Config keys; null unsets a key */
export const configMapSchema = z.record(scalarSchema);

export const deviceMapSchema = z.record(z.record(scalarSchema));

type DeviceSettings = Record<string, string | number | boolean>;

export function dropNullSettings(
  devices: Record<string, Record<string, string | number | boolean | null>>
): Record<string, DeviceSettings> {
  const result: Record<string, DeviceSettings> = {};
  for (const [name, settings] of Object.entries(devices)) {
    const kept: DeviceSettings = {};
    for (const [key, value] of Object.entries(settings)) {
      if (value !== null) {
        kept[key] = value;
      }
    }
    result[name] = kept;
  }
  return result;
}

/**
 * Devices declared whole. A null setting is left off, so the device is
 * written without it.
 */
export const deviceDeclarationSchema = deviceMapSchema.transform(dropNullSettings);

export const nameSchema = z.string().min(1);

/** Per-resource overrides of the configured project and remote */
export const scopeFields = {
  project: nameSchema.optional(),
  remote: nameSchema.optional()
};

export const presence = z.enum(["present", "absent"]).default("present");
