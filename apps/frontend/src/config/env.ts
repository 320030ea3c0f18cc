import { z } from 'zod';
import { CAPSULE_CONFIG } from 'shared';
import { logger } from '../utils/logger';

const EnvSchema = z.object({
  VITE_CAPSULE_EDGE: z.enum(['top', 'bottom']).default('bottom'),
  VITE_CAPSULE_Y_OFFSET: z.coerce.number().finite().min(0).default(24),
  VITE_CAPSULE_TIMEOUT_SECONDS: z.coerce
    .number()
    .finite()
    .positive()
    .max(CAPSULE_CONFIG.MAX_TIMEOUT_SECONDS)
    .default(CAPSULE_CONFIG.DEFAULT_TIMEOUT_SECONDS),
});

export type DemoEnv = z.infer<typeof EnvSchema>;

/**
 * Parse the demo app's environment. Unset or empty variables take their
 * defaults; an invalid value falls back to the defaults for every field.
 */
export function parseDemoEnv(raw: Record<string, unknown>): DemoEnv {
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = EnvSchema.safeParse(cleaned);
  if (result.success) return result.data;
  logger.warn('Ignoring invalid demo environment:', result.error.issues);
  return EnvSchema.parse({});
}
