import type { CSSProperties, HTMLAttributes, MouseEvent, ReactNode } from 'react';
import { CAPSULE_CONFIG } from 'shared';
import type { CapsuleOverlayConfiguration } from 'shared';
import { FractionalOutline } from './FractionalOutline';
import styles from './CapsuleView.module.css';

export type IconRenderer = (iconIdentifier: string) => ReactNode;

interface CapsuleViewProps {
  config: CapsuleOverlayConfiguration;
  completionAmount: number;
  renderIcon: IconRenderer;
  onPrimary: () => void;
  onSecondary: () => void;
  onDismissButton: () => void;
  /** Pointer handlers from useSwipeDismiss, spread onto the capsule body. */
  gestureHandlers?: HTMLAttributes<HTMLDivElement>;
}

/**
 * The visible pill: dismiss button, title, primary action icon and an
 * optional secondary action button, outlined by the countdown stroke.
 *
 * The pill is a labelled group of sibling buttons. The title and primary
 * icon form the primary button, which is what keyboard and assistive
 * technology reach; a pointer press anywhere else on the pill also triggers
 * the primary action. Each button stops propagation so the pill's own click
 * handler never runs twice.
 */
export function CapsuleView({
  config,
  completionAmount,
  renderIcon,
  onPrimary,
  onSecondary,
  onDismissButton,
  gestureHandlers,
}: CapsuleViewProps) {
  const primary = config.primaryAction;
  const secondary = config.secondaryAction;
  const primaryEnabled = primary.kind === 'enabled';

  const stop = (handler: () => void) => (e: MouseEvent<HTMLButtonElement>) => {
    e.stopPropagation();
    handler();
  };

  const style: CSSProperties = {
    '--capsule-accent': config.accentColor,
    '--capsule-width': `${CAPSULE_CONFIG.WIDTH}px`,
    '--capsule-min-height': `${CAPSULE_CONFIG.MIN_HEIGHT}px`,
    '--capsule-padding': `${CAPSULE_CONFIG.PADDING}px`,
    '--capsule-icon-opacity': CAPSULE_CONFIG.ACTION_ICON_OPACITY,
  };

  return (
    <div
      {...gestureHandlers}
      className={styles.capsule}
      style={style}
      role="group"
      aria-label={config.title}
      data-primary={primary.kind}
      data-testid="capsule"
      onClick={onPrimary}
    >
      <button
        type="button"
        className={styles.dismissButton}
        onClick={stop(onDismissButton)}
        aria-label="Dismiss"
      >
        {renderIcon('xmark.circle.fill')}
      </button>

      <button
        type="button"
        className={styles.primaryButton}
        onClick={stop(onPrimary)}
        aria-label={config.title}
        aria-disabled={!primaryEnabled}
        data-testid="capsule-primary"
      >
        <span className={styles.title}>{config.title}</span>
        {primary.kind === 'enabled' && (
          <span className={styles.primaryIcon} data-testid="capsule-primary-icon">
            {renderIcon(primary.iconIdentifier)}
          </span>
        )}
      </button>

      {secondary.kind === 'enabled' && (
        <button
          type="button"
          className={styles.secondaryButton}
          onClick={stop(onSecondary)}
          aria-label={secondary.iconIdentifier}
        >
          {renderIcon(secondary.iconIdentifier)}
        </button>
      )}

      <FractionalOutline completionAmount={completionAmount} accentColor={config.accentColor} />
    </div>
  );
}
