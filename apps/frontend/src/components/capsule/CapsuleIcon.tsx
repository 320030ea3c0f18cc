import iconGlyphs from './icons.json';
import styles from './CapsuleIcon.module.css';

const GLYPHS: Readonly<Record<string, string>> = iconGlyphs;

export function resolveIconGlyph(iconIdentifier: string): string {
  return GLYPHS[iconIdentifier] ?? iconIdentifier;
}

interface CapsuleIconProps {
  iconIdentifier: string;
  className?: string;
}

/**
 * Default icon renderer. Known identifiers map to a glyph; anything else is
 * rendered as its own text so a custom identifier is still visible.
 */
export function CapsuleIcon({ iconIdentifier, className }: CapsuleIconProps) {
  return (
    <span
      className={className ? `${styles.icon} ${className}` : styles.icon}
      data-icon={iconIdentifier}
      aria-hidden="true"
    >
      {resolveIconGlyph(iconIdentifier)}
    </span>
  );
}
