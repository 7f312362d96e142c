import { DeviceDefinition, SensorCatalog, SourceFile } from '../types';
import { toTableName } from '../utils/normalizer';
import { DeviceParser, SensorMatch } from './types';

/**
 * Parser for one device family: claims every file whose stem starts with
 * one of the device's prefixes
 */
export function createDeviceParser(
  definition: DeviceDefinition,
  catalog: SensorCatalog
): DeviceParser {
  const prefixes = definition.prefixes.map((prefix) => prefix.toLowerCase());

  return {
    device: definition.device,
    label: definition.label,
    matches(file: SourceFile): SensorMatch | null {
      const table = toTableName(file.stem);
      if (!prefixes.some((prefix) => table.startsWith(prefix))) {
        return null;
      }

      const known = catalog.sensors[table];
      const sensor = known && known.device === definition.device ? known : null;
      return {
        device: definition.device,
        table,
        definition: sensor,
        annotation: sensor
          ? `${sensor.description} (${sensor.units}, ${sensor.samplingRate})`
          : `${definition.label} stream ${table}`,
      };
    },
  };
}

export function createDeviceParsers(catalog: SensorCatalog): DeviceParser[] {
  return catalog.devices.map((device) => createDeviceParser(device, catalog));
}
