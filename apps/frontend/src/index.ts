import type { CapsuleOverlayConfiguration, CapsuleOverlayInput } from 'shared';
import { useCapsuleStore } from './stores/capsuleStore';

export { CapsuleOverlay } from './components/capsule/CapsuleOverlay';
export type { CapsuleOverlayProps } from './components/capsule/CapsuleOverlay';
export { CapsuleView } from './components/capsule/CapsuleView';
export type { IconRenderer } from './components/capsule/CapsuleView';
export { CapsuleIcon, resolveIconGlyph } from './components/capsule/CapsuleIcon';
export { FractionalOutline } from './components/capsule/FractionalOutline';
export { useCapsuleStore } from './stores/capsuleStore';
export { CapsuleConfigError } from './utils/errors';
export { setLogLevel } from './utils/logger';
export type { LogLevel } from './utils/logger';
export type {
  CapsuleAction,
  CapsuleEdge,
  CapsuleOverlayConfiguration,
  CapsuleOverlayInput,
  PresentationMode,
  SwipeDismissOptions,
} from 'shared';

/** Present a capsule from outside React. Throws CapsuleConfigError on invalid input. */
export function showCapsule(input: CapsuleOverlayInput): CapsuleOverlayConfiguration {
  return useCapsuleStore.getState().present(input);
}

export function dismissCapsule(): void {
  useCapsuleStore.getState().dismiss();
}
