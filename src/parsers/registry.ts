import { SensorCatalog, SourceFile } from '../types';
import { csvReader, textReader } from './delimited';
import { createDeviceParsers } from './devices';
import { DeviceParser, SensorMatch, TabularReader } from './types';
import { workbookReader } from './workbook';

/**
 * Device parsers and file readers, looked up by the folder walk. The walk
 * never names a device type; adding one is a register() call.
 */
export class ParserRegistry {
  private readonly parsers: DeviceParser[] = [];
  private readonly readers = new Map<string, TabularReader>();

  register(parser: DeviceParser): this {
    if (this.parsers.some((p) => p.device === parser.device)) {
      throw new Error(`A parser for device ${parser.device} is already registered`);
    }
    this.parsers.push(parser);
    return this;
  }

  registerReader(reader: TabularReader): this {
    for (const extension of reader.extensions) {
      this.readers.set(extension.toLowerCase(), reader);
    }
    return this;
  }

  readerFor(file: SourceFile): TabularReader | null {
    return this.readers.get(file.extension) ?? null;
  }

  /**
   * First registered parser that claims the file
   */
  resolve(file: SourceFile): SensorMatch | null {
    for (const parser of this.parsers) {
      const match = parser.matches(file);
      if (match) {
        return match;
      }
    }
    return null;
  }

  getParsers(): DeviceParser[] {
    return [...this.parsers];
  }

  getExtensions(): string[] {
    return [...this.readers.keys()];
  }
}

/**
 * Registry with the four catalog devices and the csv, text and xlsx readers
 */
export function createDefaultRegistry(catalog: SensorCatalog): ParserRegistry {
  const registry = new ParserRegistry()
    .registerReader(csvReader)
    .registerReader(textReader)
    .registerReader(workbookReader);

  for (const parser of createDeviceParsers(catalog)) {
    registry.register(parser);
  }
  return registry;
}
