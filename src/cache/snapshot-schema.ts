import Ajv from 'ajv';
import { CacheStats } from './types';

/** On-disk form of an entry; the fingerprint is the map key. */
export interface PersistedEntry {
  query: string;
  result: string;
  scope: string;
  createdAt: number;
  hitCount: number;
}

export interface PersistedSnapshot {
  entries: Record<string, PersistedEntry>;
  /** Absent in snapshots written before stats were tracked */
  stats?: CacheStats;
}

const counter = { type: 'integer', minimum: 0 };

const snapshotSchema = {
  type: 'object',
  required: ['entries'],
  properties: {
    entries: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['query', 'result', 'scope', 'createdAt', 'hitCount'],
        properties: {
          query: { type: 'string' },
          result: { type: 'string' },
          scope: { type: 'string' },
          createdAt: { type: 'number' },
          hitCount: counter,
        },
      },
    },
    stats: {
      type: 'object',
      required: ['hits', 'misses', 'saves'],
      properties: { hits: counter, misses: counter, saves: counter },
    },
  },
};

const ajv = new Ajv({ allErrors: true });

export const validateSnapshot = ajv.compile<PersistedSnapshot>(snapshotSchema);

export function describeSnapshotErrors(): string {
  return ajv.errorsText(validateSnapshot.errors);
}
