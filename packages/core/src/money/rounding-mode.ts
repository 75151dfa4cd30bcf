/**
 * Policy applied when an operation cannot represent its exact result at the target scale.
 */
export const RoundingMode = {
  /** Away from zero */
  UP: 'UP',
  /** Towards zero (truncation) */
  DOWN: 'DOWN',
  /** Towards positive infinity */
  CEILING: 'CEILING',
  /** Towards negative infinity */
  FLOOR: 'FLOOR',
  /** Nearest neighbour, ties away from zero */
  HALF_UP: 'HALF_UP',
  /** Nearest neighbour, ties towards zero */
  HALF_DOWN: 'HALF_DOWN',
  /** Nearest neighbour, ties to the even neighbour */
  HALF_EVEN: 'HALF_EVEN',
  /** Asserts the result is exact; fails if any nonzero digit would be discarded */
  UNNECESSARY: 'UNNECESSARY',
} as const;

export type RoundingMode = (typeof RoundingMode)[keyof typeof RoundingMode];
