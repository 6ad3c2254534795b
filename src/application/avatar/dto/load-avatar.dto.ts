import { z } from 'zod';

import { AVATAR_BACKENDS } from '../../../domain/avatar/value-objects/avatar-configuration.js';

const byte = z.number().int().min(0).max(255);

export const loadAvatarCommandSchema = z.object({
  source: z.string().min(1),
  widthChars: z.number().int().positive().max(512),
  heightChars: z.number().int().positive().max(256),
  backend: z.enum(AVATAR_BACKENDS).default('auto'),
  fpsCap: z.number().min(0).max(1000).nullable().default(null),
  background: z.tuple([byte, byte, byte]).default([0, 0, 0]),
});

export type LoadAvatarPayload = z.input<typeof loadAvatarCommandSchema>;

export type LoadAvatarRequest = z.output<typeof loadAvatarCommandSchema>;
