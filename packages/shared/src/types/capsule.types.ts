export type CapsuleEdge = 'top' | 'bottom';

/**
 * Where the capsule is pinned. `yOffset` is measured from the anchoring
 * edge toward the centre of the viewport.
 */
export type PresentationMode =
  | { edge: 'top'; yOffset: number }
  | { edge: 'bottom'; yOffset: number };

export type CapsuleAction =
  | { kind: 'disabled' }
  | { kind: 'enabled'; iconIdentifier: string; onPressed: () => void };

export interface CapsuleOverlayConfiguration {
  /** A new id means a new capsule: the outline restarts without animating. */
  id: string;
  title: string;
  accentColor: string;
  /** Seconds until auto-dismissal. */
  timeoutInterval: number;
  presentationMode: PresentationMode;
  primaryAction: CapsuleAction;
  secondaryAction: CapsuleAction;
  onDismissButtonPressed?: () => void;
}

/** Input accepted by `present`; everything but the title has a default. */
export interface CapsuleOverlayInput {
  id?: string;
  title: string;
  accentColor?: string;
  timeoutInterval?: number;
  presentationMode?: PresentationMode;
  primaryAction?: CapsuleAction;
  secondaryAction?: CapsuleAction;
  onDismissButtonPressed?: () => void;
}

export interface SwipeDismissOptions {
  /** px of travel toward the edge that dismisses on release */
  distanceThreshold: number;
  /** px/ms release velocity toward the edge that dismisses */
  velocityThreshold: number;
}

export type TickResult = 'idle' | 'counting' | 'expired';
