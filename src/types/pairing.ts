/**
 * Opposite-pair matching type definitions
 */

/**
 * Pair id numbering scheme
 *
 * - sequential: one global counter, every pair gets its own id
 * - magnitude: every pair of the same magnitude shares the id of its
 *   magnitude group (groups numbered by first appearance)
 */
export type PairNumbering = "sequential" | "magnitude";

/**
 * Input record for the matcher
 */
export type MatchInput = {
  /** Finite number, or null for "no value" */
  value: number | null;
  /** Records only pair within the same partition key */
  partitionKey?: string;
};

/**
 * Matcher state for one record
 */
export type ValueRecord = {
  /** 0-based position in the input sequence */
  index: number;
  value: number | null;
  pairId: number | null;
};

export type MatchOptions = {
  numbering?: PairNumbering;
};

export type MatchResult = {
  /** Parallel to the input, null where no pair was formed */
  pairIds: (number | null)[];
  /** Number of pairs formed */
  pairCount: number;
  /** Numeric records left without a pair (zero included) */
  unpairedCount: number;
};
