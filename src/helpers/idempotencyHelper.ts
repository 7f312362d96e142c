import { createHash } from 'crypto';
import { DeviceType } from '../types';

export interface RowKeyInput {
  participantId: string;
  device: DeviceType;
  sourceFile: string; // relative to the extraction root
  rowIndex: number;
}

/**
 * Idempotency key of a reading. Re-extracting an unchanged file yields the
 * same keys, which the UNIQUE row_key column turns into ignored inserts.
 */
export function computeRowKey(input: RowKeyInput): string {
  return createHash('sha256')
    .update(
      [input.participantId, input.device, input.sourceFile, String(input.rowIndex)].join(
        '\u0000'
      )
    )
    .digest('hex');
}
