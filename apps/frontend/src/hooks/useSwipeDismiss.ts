import { useCallback, useRef, useState } from 'react';
import type { MouseEvent as ReactMouseEvent, PointerEvent as ReactPointerEvent } from 'react';
import { SWIPE_CONFIG, SwipeDismissOptionsSchema } from 'shared';
import type { CapsuleEdge, SwipeDismissOptions } from 'shared';
import { logger } from '../utils/logger';
import { resolveSwipeOffset, shouldDismissSwipe } from '../utils/swipeDismiss';

interface UseSwipeDismissArgs {
  edge: CapsuleEdge;
  onDismiss: () => void;
  onOffsetChange: (offset: number) => void;
  options?: Partial<SwipeDismissOptions>;
  resistance?: number;
  /** Clock used for release velocity (ms). */
  now?: () => number;
}

interface DragSample {
  y: number;
  t: number;
}

interface DragState {
  pointerId: number;
  startY: number;
  last: DragSample;
  previous: DragSample;
  dragging: boolean;
}

const defaultNow = () => performance.now();

const DEFAULT_OPTIONS: SwipeDismissOptions = {
  distanceThreshold: SWIPE_CONFIG.DISTANCE_THRESHOLD,
  velocityThreshold: SWIPE_CONFIG.VELOCITY_THRESHOLD,
};

function resolveOptions(options: Partial<SwipeDismissOptions> | undefined): SwipeDismissOptions {
  const parsed = SwipeDismissOptionsSchema.safeParse({ ...DEFAULT_OPTIONS, ...options });
  if (parsed.success) return parsed.data;
  logger.warn('Invalid swipe options, using defaults:', parsed.error.issues);
  return DEFAULT_OPTIONS;
}

// Velocity at release: from the last move to the release point when the
// pointer moved since, otherwise across the last two moves. Zero once the
// pointer has rested longer than the release window.
function releaseVelocity(previous: DragSample, last: DragSample, release: DragSample): number {
  if (release.t - last.t > SWIPE_CONFIG.RELEASE_VELOCITY_WINDOW_MS) return 0;
  const [from, to] = release.y !== last.y ? [last, release] : [previous, last];
  const dt = to.t - from.t;
  return dt > 0 ? (to.y - from.y) / dt : 0;
}

/**
 * Pointer handlers for swipe-to-dismiss toward `edge`. A press that moves
 * further than the tap slop becomes a drag, and the click it would produce
 * is swallowed so the capsule's primary action does not fire.
 */
export function useSwipeDismiss({
  edge,
  onDismiss,
  onOffsetChange,
  options,
  resistance = SWIPE_CONFIG.RESISTANCE,
  now = defaultNow,
}: UseSwipeDismissArgs) {
  const dragRef = useRef<DragState | null>(null);
  const suppressClickRef = useRef(false);
  const [isDragging, setIsDragging] = useState(false);

  const { distanceThreshold, velocityThreshold } = resolveOptions(options);

  const onPointerDown = useCallback(
    (e: ReactPointerEvent<HTMLElement>) => {
      if (e.button !== 0) return;
      const sample = { y: e.clientY, t: now() };
      dragRef.current = {
        pointerId: e.pointerId,
        startY: e.clientY,
        last: sample,
        previous: sample,
        dragging: false,
      };
      suppressClickRef.current = false;
    },
    [now],
  );

  const onPointerMove = useCallback(
    (e: ReactPointerEvent<HTMLElement>) => {
      const drag = dragRef.current;
      if (!drag || drag.pointerId !== e.pointerId) return;

      const translation = e.clientY - drag.startY;
      if (!drag.dragging) {
        if (Math.abs(translation) < SWIPE_CONFIG.TAP_SLOP) return;
        drag.dragging = true;
        setIsDragging(true);
        if (typeof e.currentTarget.setPointerCapture === 'function') {
          e.currentTarget.setPointerCapture(e.pointerId);
        }
      }

      drag.previous = drag.last;
      drag.last = { y: e.clientY, t: now() };
      onOffsetChange(resolveSwipeOffset(edge, translation, resistance));
    },
    [edge, now, onOffsetChange, resistance],
  );

  const finish = useCallback(
    (e: ReactPointerEvent<HTMLElement>, cancelled: boolean) => {
      const drag = dragRef.current;
      if (!drag || drag.pointerId !== e.pointerId) return;
      dragRef.current = null;
      if (!drag.dragging) return;

      setIsDragging(false);
      suppressClickRef.current = true;
      const translation = e.clientY - drag.startY;
      const velocity = releaseVelocity(drag.previous, drag.last, { y: e.clientY, t: now() });

      if (
        !cancelled &&
        shouldDismissSwipe(edge, translation, velocity, { distanceThreshold, velocityThreshold })
      ) {
        onDismiss();
        return;
      }
      onOffsetChange(0);
    },
    [distanceThreshold, edge, now, onDismiss, onOffsetChange, velocityThreshold],
  );

  const onPointerUp = useCallback((e: ReactPointerEvent<HTMLElement>) => finish(e, false), [finish]);
  const onPointerCancel = useCallback((e: ReactPointerEvent<HTMLElement>) => finish(e, true), [finish]);

  const onClickCapture = useCallback((e: ReactMouseEvent<HTMLElement>) => {
    if (!suppressClickRef.current) return;
    suppressClickRef.current = false;
    e.preventDefault();
    e.stopPropagation();
  }, []);

  return {
    isDragging,
    handlers: { onPointerDown, onPointerMove, onPointerUp, onPointerCancel, onClickCapture },
  };
}
