/**
 * Zustand store reset registry for tests. setup.ts registers each store's
 * initial state; call resetAllStores() in beforeEach.
 */
import { act } from '@testing-library/react';

type ResetFn = () => void;

const resets = new Map<string, ResetFn>();

export function registerStoreReset(name: string, reset: ResetFn) {
  resets.set(name, reset);
}

export async function resetAllStores() {
  await act(async () => {
    for (const reset of resets.values()) reset();
  });
}
