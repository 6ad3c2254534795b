import { z } from 'zod';

export const DOWNLOAD_MODES = ['auto', 'video', 'images'] as const;

export type DownloadMode = (typeof DOWNLOAD_MODES)[number];

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export const downloadUrlCommandSchema = z.object({
  url: z
    .string()
    .trim()
    .min(1)
    .refine(isAbsoluteUrl, { message: 'Expected an absolute URL' }),
  outputRoot: z.string().min(1).default('downloads'),
  mode: z.enum(DOWNLOAD_MODES).default('auto'),
  maxImages: z.number().int().min(0).nullable().default(null),
});

export type DownloadUrlPayload = z.input<typeof downloadUrlCommandSchema>;

export type DownloadUrlRequest = z.output<typeof downloadUrlCommandSchema>;
