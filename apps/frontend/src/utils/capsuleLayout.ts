import type { CapsuleEdge, PresentationMode } from 'shared';

/**
 * Vertical translation of the capsule. The swipe offset is added as-is;
 * the presentation offset pushes away from the anchoring edge, which is
 * upward (negative) for a bottom capsule.
 */
export function capsuleYOffset(mode: PresentationMode | null, swipeOffset: number): number {
  if (!mode) return 0;
  switch (mode.edge) {
    case 'bottom':
      return swipeOffset - mode.yOffset;
    case 'top':
      return swipeOffset + mode.yOffset;
  }
}

/** Edge the capsule is aligned to inside the overlay. */
export function capsuleAlignment(mode: PresentationMode | null): CapsuleEdge {
  return mode ? mode.edge : 'bottom';
}

/** Edge the capsule slides in from and out to, and swipes toward. */
export function dismissEdge(mode: PresentationMode | null): CapsuleEdge {
  return mode ? mode.edge : 'bottom';
}
