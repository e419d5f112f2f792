import { WorkUnit } from './types';
import { TimestampHelper } from '../utils/timestamp-helper';
import { getFaker } from '../utils/faker-manager';

export type UnitIdStrategy = 'sequence' | 'uuid';

export interface UnitGeneratorOptions {
  kind?: string;
  /** First sequence number */
  offset?: number;
  /** Units per `batch` label in the metadata */
  batchSize?: number;
  /** `sequence` ids are the decimal sequence number, `uuid` ids are random */
  ids?: UnitIdStrategy;
}

/**
 * `count` units numbered from `offset`, each with metadata `{ sequence, batch: "test_<n>" }`.
 */
export function generateUnits(count: number, options: UnitGeneratorOptions = {}): WorkUnit[] {
  const kind = options.kind ?? 'test_unit';
  const offset = options.offset ?? 0;
  const batchSize = options.batchSize ?? 100;
  const ids = options.ids ?? 'sequence';
  const timestamp = TimestampHelper.now();

  const units: WorkUnit[] = [];
  for (let i = 0; i < count; i++) {
    const sequence = offset + i;
    units.push({
      id: ids === 'uuid' ? getFaker().string.uuid() : String(sequence),
      kind,
      timestamp,
      metadata: {
        sequence,
        batch: `test_${Math.floor(sequence / batchSize)}`
      }
    });
  }
  return units;
}
