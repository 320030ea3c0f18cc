import { useEffect } from 'react';
import { CAPSULE_CONFIG } from 'shared';
import type { CapsuleOverlayConfiguration } from 'shared';
import { useCapsuleStore } from '../stores/capsuleStore';

/**
 * Drives the countdown: one store tick per TICK_INTERVAL_MS while a capsule
 * is presented. The interval restarts on every presentation (each `present`
 * yields a new config object, even for a reused id), so the first strike
 * lands a full interval after the capsule appears.
 */
export function useCapsuleTicker(
  config: CapsuleOverlayConfiguration | null,
  intervalMs: number = CAPSULE_CONFIG.TICK_INTERVAL_MS,
) {
  useEffect(() => {
    if (!config) return;
    const handle = setInterval(() => {
      useCapsuleStore.getState().tick();
    }, intervalMs);
    return () => clearInterval(handle);
  }, [config, intervalMs]);
}
