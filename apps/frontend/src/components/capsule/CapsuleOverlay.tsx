import { useRef } from 'react';
import type { CSSProperties } from 'react';
import { CAPSULE_CONFIG } from 'shared';
import type { SwipeDismissOptions } from 'shared';
import { useCapsuleStore } from '../../stores/capsuleStore';
import { useCapsuleTicker } from '../../hooks/useCapsuleTicker';
import { usePresenceTransition } from '../../hooks/usePresenceTransition';
import { useSwipeDismiss } from '../../hooks/useSwipeDismiss';
import { capsuleAlignment, capsuleYOffset, dismissEdge } from '../../utils/capsuleLayout';
import { completionAmount } from '../../utils/countdown';
import { ErrorBoundary } from '../ui/ErrorBoundary';
import { CapsuleIcon } from './CapsuleIcon';
import { CapsuleView } from './CapsuleView';
import type { IconRenderer } from './CapsuleView';
import styles from './CapsuleOverlay.module.css';

export interface CapsuleOverlayProps {
  /** Custom icon rendering; defaults to the built-in glyph table. */
  renderIcon?: IconRenderer;
  swipeOptions?: Partial<SwipeDismissOptions>;
}

const defaultRenderIcon: IconRenderer = (iconIdentifier) => <CapsuleIcon iconIdentifier={iconIdentifier} />;

/**
 * Full-viewport, click-through host for the capsule presented through
 * useCapsuleStore. Mount once near the root of the app.
 */
export function CapsuleOverlay({ renderIcon = defaultRenderIcon, swipeOptions }: CapsuleOverlayProps) {
  const currentConfig = useCapsuleStore((s) => s.currentConfig);
  const numStrikes = useCapsuleStore((s) => s.numStrikes);
  const swipeOffset = useCapsuleStore((s) => s.swipeOffset);
  const dismiss = useCapsuleStore((s) => s.dismiss);
  const pressPrimary = useCapsuleStore((s) => s.pressPrimary);
  const pressSecondary = useCapsuleStore((s) => s.pressSecondary);
  const pressDismissButton = useCapsuleStore((s) => s.pressDismissButton);
  const setSwipeOffset = useCapsuleStore((s) => s.setSwipeOffset);

  useCapsuleTicker(currentConfig);

  // The exiting capsule stays rendered until the dismiss animation has
  // finished, showing the completion it had when it was dismissed.
  const { rendered, phase, generation } = usePresenceTransition(currentConfig, CAPSULE_CONFIG.DISMISS_ANIMATION_MS);
  const lastCompletionRef = useRef(1);
  if (currentConfig) {
    lastCompletionRef.current = completionAmount(numStrikes, currentConfig.timeoutInterval);
  }
  const shownCompletion = lastCompletionRef.current;
  const mode = rendered?.presentationMode ?? null;
  const edge = dismissEdge(mode);

  const swipe = useSwipeDismiss({
    edge,
    onDismiss: dismiss,
    onOffsetChange: setSwipeOffset,
    options: swipeOptions,
  });

  const slotStyle: CSSProperties = {
    '--capsule-y-offset': `${capsuleYOffset(mode, swipeOffset)}px`,
    '--capsule-exit-ms': `${CAPSULE_CONFIG.DISMISS_ANIMATION_MS}ms`,
  };

  return (
    <div className={styles.overlay} data-testid="capsule-overlay" data-align={capsuleAlignment(mode)}>
      <ErrorBoundary resetKey={generation}>
        {rendered && (
          <div
            key={generation}
            className={styles.slot}
            style={slotStyle}
            data-edge={edge}
            data-phase={phase}
            data-dragging={swipe.isDragging || undefined}
          >
            <CapsuleView
              config={rendered}
              completionAmount={shownCompletion}
              renderIcon={renderIcon}
              onPrimary={pressPrimary}
              onSecondary={pressSecondary}
              onDismissButton={pressDismissButton}
              gestureHandlers={swipe.handlers}
            />
          </div>
        )}
      </ErrorBoundary>
    </div>
  );
}
