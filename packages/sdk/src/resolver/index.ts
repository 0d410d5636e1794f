/**
 * Conflict resolution strategies
 * @module resolver
 */

import { deepEqual } from 'rxdb/plugins/utils';
import type { RecordData, SyncRecord } from '../storage/schema.js';

/**
 * Decides the outcome when the local and remote copies of a record diverge.
 * Implementations must be pure: the same inputs always give the same output.
 */
export interface ConflictResolver {
  readonly name: string;
  resolve(local: SyncRecord, remote: SyncRecord): SyncRecord;
}

/**
 * Decides whether a resolved conflict should be flagged for the user
 */
export type AttentionPolicy = (
  local: SyncRecord,
  remote: SyncRecord,
  resolved: SyncRecord
) => boolean;

export const neverRequiresAttention: AttentionPolicy = () => false;

/**
 * Flags conflicts whose resolution threw away local content
 */
export const localChangesLost: AttentionPolicy = (local, _remote, resolved) =>
  !sameContent(local, resolved);

/**
 * Same user-visible content, ignoring version and timestamps.
 * Two tombstones are always the same.
 */
export function sameContent(a: SyncRecord, b: SyncRecord): boolean {
  return a.deleted === b.deleted && (a.deleted || deepEqual(a.data, b.data));
}

function settle(winner: SyncRecord, local: SyncRecord, remote: SyncRecord): SyncRecord {
  return {
    ...winner,
    id: remote.id,
    version: Math.max(local.version, remote.version),
  };
}

/**
 * A delete racing an update wins only when it is strictly later
 */
export function resolveDeleteRace(local: SyncRecord, remote: SyncRecord): SyncRecord {
  const [deleted, survivor] = local.deleted ? [local, remote] : [remote, local];
  const winner = deleted.updatedAt > survivor.updatedAt ? deleted : survivor;
  return settle(winner, local, remote);
}

function pickLatest(local: SyncRecord, remote: SyncRecord): SyncRecord {
  // Ties go to the remote so every replica lands on the same record
  return local.updatedAt > remote.updatedAt ? local : remote;
}

/**
 * Last-write-wins by updatedAt
 */
export const lastWriteWins: ConflictResolver = {
  name: 'last-write-wins',
  resolve(local, remote) {
    if (local.deleted !== remote.deleted) {
      return resolveDeleteRace(local, remote);
    }
    return settle(pickLatest(local, remote), local, remote);
  },
};

export interface FieldMergeOptions {
  /** Array fields whose values are unioned instead of overwritten */
  unionFields: string[];
}

function union(first: unknown[], second: unknown[]): unknown[] {
  const seen = new Set<string>();
  const result: unknown[] = [];
  for (const value of [...first, ...second]) {
    const key = JSON.stringify(value);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(value);
    }
  }
  return result;
}

/**
 * Unions the configured array fields and applies last-write-wins to everything
 * else. The winner's elements come first. Deletes fall back to last-write-wins.
 */
export function fieldMerge(options: FieldMergeOptions): ConflictResolver {
  return {
    name: `field-merge(${options.unionFields.join(',')})`,
    resolve(local, remote) {
      if (local.deleted || remote.deleted) {
        return lastWriteWins.resolve(local, remote);
      }

      const winner = pickLatest(local, remote);
      const loser = winner === local ? remote : local;
      const data: RecordData = { ...winner.data };

      for (const field of options.unionFields) {
        const ours = winner.data[field];
        const theirs = loser.data[field];
        if (Array.isArray(ours) && Array.isArray(theirs)) {
          data[field] = union(ours, theirs);
        } else if (ours === undefined && Array.isArray(theirs)) {
          data[field] = theirs;
        }
      }

      return settle({ ...winner, data }, local, remote);
    },
  };
}
