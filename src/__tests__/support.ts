import { Workbook } from 'exceljs';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { SensorCatalog } from '../types';

/**
 * Temporary folder removed by cleanup()
 */
export function createTempDir(prefix = 'wearable-catalog-'): {
  dir: string;
  cleanup: () => void;
} {
  const dir = mkdtempSync(path.join(os.tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * Writes a one-sheet workbook, creating its folders first
 */
export async function writeWorkbookFixture(
  root: string,
  relativePath: string,
  rows: (string | number | boolean)[][]
): Promise<string> {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet('export');
  for (const row of rows) {
    sheet.addRow(row);
  }
  const filePath = path.join(root, relativePath);
  mkdirSync(path.dirname(filePath), { recursive: true });
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

/**
 * Writes a file, creating its folders first
 */
export function writeFixture(root: string, relativePath: string, content: string): string {
  const filePath = path.join(root, relativePath);
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Small catalog with one known stream per device
 */
export const testCatalog: SensorCatalog = {
  devices: [
    { device: 'earable', label: 'Earable sensor', prefixes: ['ear_'] },
    { device: 'headband', label: 'EEG headband', prefixes: ['forehead_', 'muse_'] },
    { device: 'chest', label: 'Chest monitor', prefixes: ['chest_', 'zephyr_'] },
    { device: 'wristband', label: 'Wristband', prefixes: ['wrist_'] },
  ],
  sensors: {
    ear_acc_left: {
      device: 'earable',
      columns: ['timestamp', 'ax', 'ay', 'az'],
      description: 'Left ear accelerometer',
      units: 'g',
      samplingRate: '100 Hz',
      sensorType: 'accelerometer',
    },
    forehead_eeg_raw: {
      device: 'headband',
      columns: ['timestamp', 'tp9', 'af7', 'af8', 'tp10'],
      description: 'Raw EEG',
      units: 'uV',
      samplingRate: '256 Hz',
      sensorType: 'eeg',
    },
    chest_raw_ecg: {
      device: 'chest',
      columns: ['timestamp', 'ecg'],
      description: 'Raw ECG',
      units: 'mV',
      samplingRate: '250 Hz',
      sensorType: 'ecg',
    },
    wrist_hr: {
      device: 'wristband',
      columns: ['timestamp', 'hr'],
      description: 'Heart rate',
      units: 'bpm',
      samplingRate: '1 Hz',
      sensorType: 'heart rate',
    },
  },
  columnDescriptions: {
    timestamp: 'Sample time',
    hr: 'Heart rate',
  },
};
