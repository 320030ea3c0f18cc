import 'react';

// Allow CSS custom properties (`--capsule-accent`, ...) in inline styles.
declare module 'react' {
  interface CSSProperties {
    [customProperty: `--${string}`]: string | number | undefined;
  }
}
