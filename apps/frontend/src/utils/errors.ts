import type { ZodIssue } from 'zod';

export class CapsuleConfigError extends Error {
  readonly code = 'INVALID_CAPSULE_CONFIG';

  constructor(
    public readonly issues: ZodIssue[],
  ) {
    super(
      `Invalid capsule configuration: ${issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'CapsuleConfigError';
  }
}
