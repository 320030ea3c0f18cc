import type { CapsuleEdge, SwipeDismissOptions } from 'shared';

/** Positive when `translationY` moves toward `edge`. */
function towardEdge(edge: CapsuleEdge, value: number): number {
  return edge === 'top' ? -value : value;
}

/**
 * Offset to render for a drag of `translationY`. Dragging toward the edge
 * tracks the pointer; dragging away is damped by `resistance`.
 */
export function resolveSwipeOffset(edge: CapsuleEdge, translationY: number, resistance: number): number {
  if (towardEdge(edge, translationY) >= 0) return translationY;
  return translationY * resistance;
}

/** Whether a released drag should dismiss instead of springing back. */
export function shouldDismissSwipe(
  edge: CapsuleEdge,
  translationY: number,
  velocityY: number,
  options: SwipeDismissOptions,
): boolean {
  if (towardEdge(edge, translationY) >= options.distanceThreshold) return true;
  return towardEdge(edge, velocityY) >= options.velocityThreshold && towardEdge(edge, translationY) > 0;
}
