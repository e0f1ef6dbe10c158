/** Upper bound on entries in one user's history. */
export const MAX_TRUST_EVENTS = 1000;

/** Inclusive bounds of a valid trust score. */
export const SCORE_MIN = 1;
export const SCORE_MAX = 10;

/** Inclusive bounds of a batch validity request. */
export const BATCH_MIN = 1;
export const BATCH_MAX = 10;

/** Requests above this size are refused before the business-rule check. */
export const BATCH_HARD_CAP = 50;
