import { z } from 'zod';
import { ConfigError } from '../errors/errors.js';

const positiveMs = z.coerce.number().int().positive();

const envSchema = z.object({
  RELEASE_CONFIG_PATH: z.string().min(1).default('release.config.json'),
  SOURCE_ROOT: z.string().min(1).optional(),
  INDEX_TOKEN: z.string().min(1).optional(),
  INDEX_UPLOAD_URL: z.string().url().optional(),
  GITHUB_TOKEN: z.string().min(1).optional(),
  GITHUB_APP_ID: z.string().min(1).optional(),
  GITHUB_PRIVATE_KEY: z.string().min(1).optional(),
  GITHUB_INSTALLATION_ID: z.coerce.number().int().positive().optional(),
  GITHUB_REPOSITORY: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/repo')
    .optional(),
  GITHUB_API_URL: z.string().url().optional(),
  GITHUB_WEBHOOK_SECRET: z.string().min(1).optional(),
  ADMIN_TOKEN: z.string().min(1).optional(),
  REDIS_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  BUILD_TIMEOUT_MS: positiveMs.optional(),
  VERIFY_TIMEOUT_MS: positiveMs.optional(),
  MAX_CONCURRENT_RELEASES: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

function blankToUndefined(source: NodeJS.ProcessEnv): Record<string, string> {
  const entries = Object.entries(source).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== ''
  );
  return Object.fromEntries(entries);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(blankToUndefined(source));
  if (!result.success) {
    // Issue messages name the variable, never its value.
    throw new ConfigError(
      'Invalid environment',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

export function parseRepository(value: string): { owner: string; repo: string } {
  const [owner, repo] = value.split('/');
  if (!owner || !repo) {
    throw new ConfigError(`Invalid repository "${value}", expected owner/repo`);
  }
  return { owner, repo };
}
