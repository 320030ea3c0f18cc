export const CAPSULE_CONFIG = {
  TICK_INTERVAL_MS: 1000,
  DISMISS_ANIMATION_MS: 300,
  OUTLINE_ANIMATION_MS: 1000, // linear, one tick long

  WIDTH: 225,
  MIN_HEIGHT: 40,
  PADDING: 5,

  OUTLINE_STROKE_WIDTH: 2,
  OUTLINE_OPACITY: 0.6,
  ACTION_ICON_OPACITY: 0.8,

  DEFAULT_TIMEOUT_SECONDS: 5,
  MAX_TIMEOUT_SECONDS: 3600,
  MAX_TITLE_LENGTH: 120,
  DEFAULT_ACCENT_COLOR: '#007AFF',
} as const;

export const SWIPE_CONFIG = {
  DISTANCE_THRESHOLD: 50, // px toward the edge
  VELOCITY_THRESHOLD: 0.5, // px/ms toward the edge
  RESISTANCE: 0.2, // fraction of the drag applied when pulling away from the edge
  TAP_SLOP: 6, // px of movement before a press counts as a drag
  RELEASE_VELOCITY_WINDOW_MS: 100, // a release later than this after the last move has no velocity
} as const;
