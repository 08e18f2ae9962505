export const OUTCOME = {
  CHANGED: 'Changed',
  UNCHANGED: 'Unchanged',
  OFFLINE: 'Offline',
  ERROR: 'Error',
} as const;

export type Outcome = (typeof OUTCOME)[keyof typeof OUTCOME];

// Section order in the run record and in the printed summary.
export const OUTCOME_ORDER: readonly Outcome[] = [
  OUTCOME.CHANGED,
  OUTCOME.UNCHANGED,
  OUTCOME.OFFLINE,
  OUTCOME.ERROR,
];

export function isOutcome(value: string): value is Outcome {
  return OUTCOME_ORDER.some((outcome) => outcome === value);
}
