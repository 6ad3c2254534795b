import { z } from 'zod';

const environmentSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  TTY_SCRAPE_PIXEL_MODULE: z.string().min(1).optional(),
});

export type Environment = z.infer<typeof environmentSchema>;

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const parsed = environmentSchema.safeParse(env);
  if (parsed.success) {
    return parsed.data;
  }

  // Unknown values fall back field by field rather than aborting startup.
  return environmentSchema.parse({
    YTDLP_PATH: env.YTDLP_PATH || undefined,
    FFMPEG_PATH: env.FFMPEG_PATH || undefined,
    TTY_SCRAPE_PIXEL_MODULE: env.TTY_SCRAPE_PIXEL_MODULE || undefined,
  });
}
