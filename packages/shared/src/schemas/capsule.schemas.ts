import { z } from 'zod';
import { CAPSULE_CONFIG } from '../constants/capsule';

const callback = z.custom<() => void>((value) => typeof value === 'function', {
  message: 'Expected a function',
});

const yOffset = z.number().finite().min(0).default(0);

export const PresentationModeSchema = z.discriminatedUnion('edge', [
  z.object({ edge: z.literal('top'), yOffset }),
  z.object({ edge: z.literal('bottom'), yOffset }),
]);

export const CapsuleActionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('disabled') }),
  z.object({
    kind: z.literal('enabled'),
    iconIdentifier: z.string().trim().min(1),
    onPressed: callback,
  }),
]);

export const CapsuleOverlayInputSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().trim().min(1).max(CAPSULE_CONFIG.MAX_TITLE_LENGTH),
  accentColor: z.string().trim().min(1).default(CAPSULE_CONFIG.DEFAULT_ACCENT_COLOR),
  timeoutInterval: z
    .number()
    .finite()
    .positive()
    .max(CAPSULE_CONFIG.MAX_TIMEOUT_SECONDS)
    .default(CAPSULE_CONFIG.DEFAULT_TIMEOUT_SECONDS),
  presentationMode: PresentationModeSchema.default({ edge: 'bottom', yOffset: 0 }),
  primaryAction: CapsuleActionSchema.default({ kind: 'disabled' }),
  secondaryAction: CapsuleActionSchema.default({ kind: 'disabled' }),
  onDismissButtonPressed: callback.optional(),
});

export const SwipeDismissOptionsSchema = z.object({
  distanceThreshold: z.number().finite().positive(),
  velocityThreshold: z.number().finite().positive(),
});
