/**
 * Fixed settle delays and timeouts. Every wait in a submission is one of
 * these; nothing blocks without a bound.
 */
export interface InteractionTiming {
  /** After scrolling a question or control into the viewport centre */
  scrollSettleMs: number;
  /** After scrolling to the bottom of the page before looking for buttons */
  bottomScrollSettleMs: number;
  /** After scrolling to an item during a radio sweep */
  sweepItemSettleMs: number;
  /** After clicking a radio option during a sweep */
  selectionSettleMs: number;
  /** After clicking Next, for the next section to render */
  sectionSettleMs: number;
  /** After clicking Submit, before classifying the result page */
  submitSettleMs: number;
  /** Bound on waiting for the initial form element */
  formLoadTimeoutMs: number;
  /** Bound on a single direct click's actionability checks */
  clickTimeoutMs: number;
}

export const DEFAULT_TIMING: Readonly<InteractionTiming> = Object.freeze({
  scrollSettleMs: 500,
  bottomScrollSettleMs: 500,
  sweepItemSettleMs: 200,
  selectionSettleMs: 300,
  sectionSettleMs: 2000,
  submitSettleMs: 3000,
  formLoadTimeoutMs: 10_000,
  clickTimeoutMs: 5000,
});

/** All settle delays zeroed; timeouts kept. */
export const NO_DELAY_TIMING: Readonly<InteractionTiming> = Object.freeze({
  ...DEFAULT_TIMING,
  scrollSettleMs: 0,
  bottomScrollSettleMs: 0,
  sweepItemSettleMs: 0,
  selectionSettleMs: 0,
  sectionSettleMs: 0,
  submitSettleMs: 0,
});

export function resolveTiming(overrides: Partial<InteractionTiming> = {}): InteractionTiming {
  return { ...DEFAULT_TIMING, ...overrides };
}
