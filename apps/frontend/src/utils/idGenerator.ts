/**
 * Generate an id for a capsule presented without one. Each call yields a
 * fresh id, so presenting the same title twice still restarts the outline.
 */
export function generateCapsuleId(): string {
  return crypto.randomUUID();
}
