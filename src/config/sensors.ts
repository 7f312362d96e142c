import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEVICE_TYPES, SensorCatalog } from '../types';

export const DEFAULT_SENSOR_CATALOG_PATH = path.resolve(
  __dirname,
  '../../data/sensors.json'
);

const deviceSchema = z.enum(DEVICE_TYPES);

const catalogSchema = z.object({
  devices: z
    .array(
      z.object({
        device: deviceSchema,
        label: z.string().min(1),
        prefixes: z.array(z.string().min(1)).min(1),
      })
    )
    .min(1),
  sensors: z.record(
    z.object({
      device: deviceSchema,
      columns: z.array(z.string().min(1)).min(1),
      description: z.string(),
      units: z.string(),
      samplingRate: z.string(),
      sensorType: z.string(),
    })
  ),
  columnDescriptions: z.record(z.string()),
});

/**
 * Loads the device and stream definitions used to recognise files and seed
 * the data dictionary
 */
export function loadSensorCatalog(
  filePath: string = DEFAULT_SENSOR_CATALOG_PATH
): SensorCatalog {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid sensor catalog ${filePath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }

  for (const [name, sensor] of Object.entries(parsed.data.sensors)) {
    const owner = parsed.data.devices.find((d) => d.device === sensor.device);
    if (!owner || !owner.prefixes.some((prefix) => name.startsWith(prefix))) {
      throw new Error(
        `Invalid sensor catalog ${filePath}: ${name} is not claimed by a ${sensor.device} prefix`
      );
    }
  }

  return parsed.data;
}
