import type { CapsuleOverlayConfiguration, TickResult } from 'shared';

export interface CountdownState {
  config: CapsuleOverlayConfiguration | null;
  numStrikes: number;
}

/**
 * Fraction of the timeout still remaining, drawn as the outline length.
 * Clamped to [0, 1] so a shortened timeout never draws past the full capsule.
 */
export function completionAmount(numStrikes: number, timeoutInterval: number): number {
  if (timeoutInterval <= 0) return 0;
  const remaining = 1 - numStrikes / timeoutInterval;
  return Math.min(1, Math.max(0, remaining));
}

/**
 * Advance the countdown by one clock strike.
 *
 * The capsule stays on screen for one full strike after the outline reaches
 * zero: with a 5s timeout the outline reads 1, 0.8, ... 0 and the sixth
 * strike reports `expired`.
 */
export function tick(state: CountdownState): { result: TickResult; numStrikes: number } {
  if (!state.config) {
    return { result: 'idle', numStrikes: state.numStrikes };
  }
  if (state.numStrikes >= state.config.timeoutInterval) {
    return { result: 'expired', numStrikes: state.numStrikes };
  }
  return { result: 'counting', numStrikes: state.numStrikes + 1 };
}
