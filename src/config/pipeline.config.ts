import { z } from 'zod';

const DEFAULT_ALLOWED_FORMATS = 'h264:mkv,h264:mp4,hevc:mkv,hevc:mp4,h265:mkv,h265:mp4';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  API_KEY: z.string().min(1).optional(),

  // Bridge to the messaging platform
  PLATFORM_BRIDGE_URL: z.string().url().default('http://127.0.0.1:8080'),
  PLATFORM_BRIDGE_API_KEY: z.string().min(1).optional(),
  BRIDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Pre-submission checks
  MAX_VIDEO_SIZE_GB: z.coerce.number().positive().default(1.5),
  ALLOWED_FORMATS: z.string().default(DEFAULT_ALLOWED_FORMATS),

  // Lifecycle
  VIDEO_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(3600),
  CHECK_INTERVAL_SECONDS: z.coerce.number().int().positive().default(30),
  MAX_QUEUED_VIDEOS: z.coerce.number().int().positive().default(100),
  QUEUE_SIZE_LIMIT: z.coerce.number().int().positive().default(1000),
  MAX_CONCURRENT_VIDEOS_REGULAR: z.coerce.number().int().positive().default(1),
  MAX_CONCURRENT_VIDEOS_PREMIUM: z.coerce.number().int().positive().default(5),
  MAX_CONCURRENT_VIDEOS_CHANNEL: z.coerce.number().int().positive().default(5),

  // Minutes of processing per minute of footage and per produced quality
  PROCESSING_TIME_FACTOR: z.coerce.number().positive().default(0.033),
});

export type PipelineEnv = z.infer<typeof envSchema>;

/**
 * `ConfigModule.forRoot({ validate })` hook: coerces the raw environment and
 * fails the boot with every offending key listed.
 */
export function validateEnv(config: Record<string, unknown>): PipelineEnv {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export interface AllowedFormat {
  codec: string;
  container: string;
}

/**
 * Parse `codec:container` pairs separated by commas, e.g. `h264:mp4,hevc:mkv`.
 */
export function parseAllowedFormats(raw: string): AllowedFormat[] {
  return raw
    .split(',')
    .map((pair) => pair.trim().toLowerCase())
    .filter((pair) => pair.length > 0)
    .map((pair) => {
      const [codec = '', container = ''] = pair.split(':');
      return { codec: codec.trim(), container: container.trim() };
    })
    .filter((format) => format.codec.length > 0 && format.container.length > 0);
}
