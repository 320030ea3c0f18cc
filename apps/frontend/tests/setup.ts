import { afterEach, vi } from 'vitest';
import { cleanup } from '@testing-library/react';
import { useCapsuleStore } from '../src/stores/capsuleStore';
import { setLogLevel } from '../src/utils/logger';
import { registerStoreReset } from './mocks/zustand';

afterEach(() => {
  cleanup();
});

// ─── Store reset ─────────────────────────────────────────────────────────────
const CAPSULE_INITIAL = {
  currentConfig: null,
  numStrikes: 0,
  swipeOffset: 0,
};
registerStoreReset('capsule', () => useCapsuleStore.setState(CAPSULE_INITIAL));

// ─── Logging ─────────────────────────────────────────────────────────────────
// Tests that assert on log output raise the level themselves.
setLogLevel('silent');

// ─── Browser APIs not in jsdom ───────────────────────────────────────────────
if (typeof globalThis.crypto?.randomUUID !== 'function') {
  vi.stubGlobal('crypto', {
    randomUUID: () => 'xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx'.replace(/[xy]/g, (c) => {
      const r = Math.random() * 16 | 0;
      return (c === 'x' ? r : (r & 0x3 | 0x8)).toString(16);
    }),
  });
}

// Older jsdom releases ship no PointerEvent, which leaves clientY/pointerId
// off events fired through testing-library.
if (typeof window !== 'undefined' && typeof window.PointerEvent === 'undefined') {
  class PointerEventStub extends MouseEvent {
    readonly pointerId: number;

    constructor(type: string, init: PointerEventInit = {}) {
      super(type, init);
      this.pointerId = init.pointerId ?? 0;
    }
  }
  vi.stubGlobal('PointerEvent', PointerEventStub);
}
