import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const envFlag = z
  .string()
  .optional()
  .transform((val) => val === '1' || val?.toLowerCase() === 'true');

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      const parsed = Number.parseInt(raw ?? '', 10);
      return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
    });

const optionalSecret = z
  .string()
  .optional()
  .transform((val) => (val && val.trim().length > 0 ? val : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  AZURE_BLOB_CONNECTION_STRING: optionalSecret,
  SKILLS_BLOB_CONTAINER: z.string().min(1).default('engineerskills-file'),
  SKILLS_BLOB_NAME: z.string().min(1).default('skillsSurveyData.xlsx'),
  BULLHORN_AUTH_URL: z.string().url().default('https://auth.bullhornstaffing.com/oauth'),
  BULLHORN_REST_URL: z.string().url().optional(),
  BULLHORN_CLIENT_ID: optionalSecret,
  BULLHORN_CLIENT_SECRET: optionalSecret,
  BULLHORN_USERNAME: optionalSecret,
  BULLHORN_PASSWORD: optionalSecret,
  SYNC_API_KEY: optionalSecret,
  MAX_STAGE_BODY_BYTES: positiveInt(1_000_000),
  STRICT_BOUNDARY_ORDER: envFlag,
});

export type AppConfig = z.infer<typeof EnvSchema>;

export interface BullhornCredentials {
  authUrl: string;
  restUrl: string;
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return Object.freeze(result.data);
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function requireBlobConnectionString(config: AppConfig): string {
  if (!config.AZURE_BLOB_CONNECTION_STRING) {
    throw new ConfigurationError('AZURE_BLOB_CONNECTION_STRING environment variable is required');
  }
  return config.AZURE_BLOB_CONNECTION_STRING;
}

type BullhornSettingKey =
  | 'BULLHORN_REST_URL'
  | 'BULLHORN_CLIENT_ID'
  | 'BULLHORN_CLIENT_SECRET'
  | 'BULLHORN_USERNAME'
  | 'BULLHORN_PASSWORD';

/**
 * Collects the destination login settings, naming every variable that is unset.
 */
export function requireBullhornCredentials(config: AppConfig): BullhornCredentials {
  const missing: string[] = [];
  const read = (key: BullhornSettingKey): string => {
    const value = config[key];
    if (!value) missing.push(key);
    return value ?? '';
  };

  const credentials: BullhornCredentials = {
    authUrl: config.BULLHORN_AUTH_URL,
    restUrl: read('BULLHORN_REST_URL'),
    clientId: read('BULLHORN_CLIENT_ID'),
    clientSecret: read('BULLHORN_CLIENT_SECRET'),
    username: read('BULLHORN_USERNAME'),
    password: read('BULLHORN_PASSWORD'),
  };
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing destination credentials: ${missing.join(', ')}`, missing);
  }
  return credentials;
}

/** Test-only: drop the cached environment so a test can load a fresh one. */
export function resetConfigForTests(): void {
  cachedConfig = null;
}
