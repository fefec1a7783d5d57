/**
 * Opposite-pair matcher
 *
 * Pure deterministic pairing of values with their sign-opposite counterpart
 * (5 with -5). No I/O, no shared state: every call owns its pending pool
 * and counter.
 *
 * Key design decisions:
 * - Single left-to-right scan, hashed lookup per value
 * - FIFO: a value pairs with the earliest still-pending opposite
 * - Zero never pairs (it has no distinct opposite)
 * - Exact comparison, no tolerance
 */

import type {
  MatchInput,
  MatchOptions,
  MatchResult,
  ValueRecord,
} from "@/types";
import { DEFAULT_NUMBERING } from "@/constants";

/**
 * FIFO queue of pending record indexes for one value
 */
type PendingQueue = {
  items: number[];
  head: number;
};

/**
 * Pending records of one partition, keyed by value
 */
type PendingPool = Map<number, PendingQueue>;

const DEFAULT_PARTITION = "";

/**
 * Map absent and non-finite values to null, -0 to 0
 */
function normalizeValue(value: number | null): number | null {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  return value === 0 ? 0 : value;
}

function getPool(pools: Map<string, PendingPool>, partition: string): PendingPool {
  let pool = pools.get(partition);
  if (!pool) {
    pool = new Map();
    pools.set(partition, pool);
  }
  return pool;
}

/**
 * Pop the oldest pending index for a value, null when none is pending
 */
function popOldest(pool: PendingPool, value: number): number | null {
  const queue = pool.get(value);
  if (!queue || queue.head >= queue.items.length) {
    return null;
  }
  const index = queue.items[queue.head];
  queue.head++;
  return index;
}

function pushPending(pool: PendingPool, value: number, index: number): void {
  const queue = pool.get(value);
  if (queue) {
    queue.items.push(index);
  } else {
    pool.set(value, { items: [index], head: 0 });
  }
}

/**
 * Id of a magnitude group, numbered by first appearance
 */
function magnitudeGroupId(groups: Map<string, number>, key: string): number {
  let id = groups.get(key);
  if (id === undefined) {
    id = groups.size + 1;
    groups.set(key, id);
  }
  return id;
}

/**
 * Pair records with their sign-opposite counterparts
 *
 * Algorithm (one pass, in input order):
 * 1. Skip records without a value and records equal to 0
 * 2. If an opposite (-value) is pending in the record's partition, pop the
 *    oldest one and give both records the next pair id
 * 3. Otherwise the record becomes pending under its own value
 *
 * Because both signs of a magnitude are consumed in arrival order, the k-th
 * pair of a magnitude always joins its k-th positive and k-th negative value.
 *
 * Numbering:
 * - sequential (default): ids 1, 2, 3... in the order pairs are formed;
 *   every id is carried by exactly two records
 * - magnitude: every pair of a magnitude carries that magnitude group's id;
 *   groups are numbered 1, 2, 3... by the first appearance of a value of
 *   the magnitude (per partition), whether or not it ever pairs. Zero opens
 *   a group of its own and so takes up a number, though it never pairs
 *
 * @param records - Values in sheet order, with optional partition keys
 * @param options - Numbering scheme
 * @returns Pair ids parallel to the input, plus counters
 *
 * @example
 * matchOppositeRecords([{ value: 5 }, { value: 3 }, { value: -5 }]).pairIds
 * // => [1, null, 1]
 */
export function matchOppositeRecords(
  records: readonly MatchInput[],
  options: MatchOptions = {},
): MatchResult {
  const numbering = options.numbering ?? DEFAULT_NUMBERING;

  const state: ValueRecord[] = records.map((record, index) => ({
    index,
    value: normalizeValue(record.value),
    pairId: null,
  }));

  const pools = new Map<string, PendingPool>();
  // partition + magnitude -> group id (magnitude numbering only)
  const magnitudeGroups = new Map<string, number>();
  let pairCounter = 0;

  for (const current of state) {
    const value = current.value;
    if (value === null) {
      continue;
    }

    const partition = records[current.index].partitionKey ?? DEFAULT_PARTITION;
    const groupId =
      numbering === "magnitude"
        ? magnitudeGroupId(magnitudeGroups, `${partition}\u0000${Math.abs(value)}`)
        : null;
    if (value === 0) {
      continue;
    }

    const pool = getPool(pools, partition);
    const matchedIndex = popOldest(pool, -value);
    if (matchedIndex === null) {
      pushPending(pool, value, current.index);
      continue;
    }

    pairCounter++;
    const pairId = groupId ?? pairCounter;

    state[matchedIndex].pairId = pairId;
    current.pairId = pairId;
  }

  let unpairedCount = 0;
  for (const record of state) {
    if (record.value !== null && record.pairId === null) {
      unpairedCount++;
    }
  }

  return {
    pairIds: state.map((record) => record.pairId),
    pairCount: pairCounter,
    unpairedCount,
  };
}

/**
 * Pair a plain sequence of values (single partition)
 *
 * @param values - Numbers in order; null marks "no value"
 * @returns Pair ids parallel to the input
 *
 * @example
 * matchOppositePairs([5, -2, -5, 3, 2])
 * // => [1, 2, 1, null, 2]
 */
export function matchOppositePairs(
  values: readonly (number | null)[],
  options: MatchOptions = {},
): (number | null)[] {
  return matchOppositeRecords(
    values.map((value) => ({ value })),
    options,
  ).pairIds;
}
