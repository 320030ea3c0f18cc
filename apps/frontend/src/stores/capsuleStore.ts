import { create } from 'zustand';
import { CAPSULE_CONFIG, CapsuleOverlayInputSchema } from 'shared';
import type { CapsuleAction, CapsuleOverlayConfiguration, CapsuleOverlayInput } from 'shared';
import { completionAmount, tick } from '../utils/countdown';
import { CapsuleConfigError } from '../utils/errors';
import { generateCapsuleId } from '../utils/idGenerator';
import { logger } from '../utils/logger';

interface CapsuleState {
  // The capsule on screen, or null when nothing is presented.
  currentConfig: CapsuleOverlayConfiguration | null;

  // Clock strikes elapsed since the current capsule was presented.
  numStrikes: number;

  // Portion of the y offset contributed by a swipe. Kept through the exit
  // animation so a swiped-away capsule leaves from where it was released.
  swipeOffset: number;

  /**
   * Validate and show a capsule, replacing any current one.
   * Throws CapsuleConfigError when the input fails validation.
   */
  present: (input: CapsuleOverlayInput) => CapsuleOverlayConfiguration;
  dismiss: () => void;

  /** One clock strike. Dismisses once the timeout has fully elapsed. */
  tick: () => void;

  pressPrimary: () => void;
  pressSecondary: () => void;
  pressDismissButton: () => void;

  setSwipeOffset: (offset: number) => void;

  /** Remaining fraction of the timeout for the current capsule (0 when none). */
  completionAmount: () => number;

  isPresented: () => boolean;
}

// Strikes reset once the exit animation has run so the outline does not
// visibly refill while the capsule slides away.
let pendingStrikeReset: ReturnType<typeof setTimeout> | null = null;

function cancelPendingStrikeReset() {
  if (pendingStrikeReset) {
    clearTimeout(pendingStrikeReset);
    pendingStrikeReset = null;
  }
}

function runAction(label: string, fn: (() => void) | undefined) {
  if (!fn) return;
  try {
    fn();
  } catch (err) {
    logger.error(`${label} handler threw:`, err);
  }
}

function enabledHandler(action: CapsuleAction): (() => void) | undefined {
  return action.kind === 'enabled' ? action.onPressed : undefined;
}

export const useCapsuleStore = create<CapsuleState>((set, get) => ({
  currentConfig: null,
  numStrikes: 0,
  swipeOffset: 0,

  present: (input) => {
    const parsed = CapsuleOverlayInputSchema.safeParse(input);
    if (!parsed.success) {
      logger.warn('Rejected capsule configuration:', parsed.error.issues);
      throw new CapsuleConfigError(parsed.error.issues);
    }

    const config: CapsuleOverlayConfiguration = {
      ...parsed.data,
      id: parsed.data.id ?? generateCapsuleId(),
    };

    cancelPendingStrikeReset();
    set({ currentConfig: config, numStrikes: 0, swipeOffset: 0 });
    logger.debug('Presented capsule', config.id);
    return config;
  },

  dismiss: () => {
    const { currentConfig } = get();
    if (!currentConfig) return;

    set({ currentConfig: null });
    logger.debug('Dismissed capsule', currentConfig.id);

    cancelPendingStrikeReset();
    pendingStrikeReset = setTimeout(() => {
      pendingStrikeReset = null;
      set({ numStrikes: 0 });
    }, CAPSULE_CONFIG.DISMISS_ANIMATION_MS);
  },

  tick: () => {
    const { currentConfig, numStrikes } = get();
    const next = tick({ config: currentConfig, numStrikes });
    switch (next.result) {
      case 'idle':
        return;
      case 'expired':
        get().dismiss();
        return;
      case 'counting':
        set({ numStrikes: next.numStrikes });
        return;
    }
  },

  pressPrimary: () => {
    const { currentConfig } = get();
    if (!currentConfig) return;
    const handler = enabledHandler(currentConfig.primaryAction);
    if (!handler) return;
    runAction('Primary action', handler);
    get().dismiss();
  },

  pressSecondary: () => {
    const { currentConfig } = get();
    if (!currentConfig) return;
    const handler = enabledHandler(currentConfig.secondaryAction);
    if (!handler) return;
    runAction('Secondary action', handler);
    get().dismiss();
  },

  pressDismissButton: () => {
    const { currentConfig } = get();
    if (!currentConfig) return;
    runAction('Dismiss button', currentConfig.onDismissButtonPressed);
    get().dismiss();
  },

  setSwipeOffset: (offset) => set({ swipeOffset: offset }),

  completionAmount: () => {
    const { currentConfig, numStrikes } = get();
    if (!currentConfig) return 0;
    return completionAmount(numStrikes, currentConfig.timeoutInterval);
  },

  isPresented: () => get().currentConfig !== null,
}));
