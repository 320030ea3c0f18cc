import { useRef } from 'react';
import { CAPSULE_CONFIG } from 'shared';
import { useElementSize } from '../../hooks/useElementSize';
import { capsulePath, outlineDash } from '../../utils/outlineGeometry';
import styles from './FractionalOutline.module.css';

interface FractionalOutlineProps {
  /** 0..1, the share of the capsule outline to stroke */
  completionAmount: number;
  accentColor: string;
}

/**
 * Capsule-shaped stroke over its positioned parent, trimmed from the top
 * centre to `completionAmount`. Changes animate linearly over one tick;
 * remount (new key) to reset without animating.
 */
export function FractionalOutline({ completionAmount, accentColor }: FractionalOutlineProps) {
  const svgRef = useRef<SVGSVGElement>(null);
  const { width, height } = useElementSize(svgRef);

  const path = capsulePath(width, height, CAPSULE_CONFIG.OUTLINE_STROKE_WIDTH / 2);
  const dash = outlineDash(completionAmount);

  return (
    <svg
      ref={svgRef}
      className={styles.outline}
      data-testid="capsule-outline"
      data-completion={completionAmount}
      aria-hidden="true"
    >
      {path && (
        <path
          d={path}
          pathLength={1}
          fill="none"
          stroke={accentColor}
          strokeOpacity={CAPSULE_CONFIG.OUTLINE_OPACITY}
          strokeWidth={CAPSULE_CONFIG.OUTLINE_STROKE_WIDTH}
          strokeLinecap="round"
          strokeDasharray={dash.strokeDasharray}
          strokeDashoffset={dash.strokeDashoffset}
          style={{ transition: `stroke-dashoffset ${CAPSULE_CONFIG.OUTLINE_ANIMATION_MS}ms linear` }}
        />
      )}
    </svg>
  );
}
