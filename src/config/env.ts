import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

// Every variable is optional: unset means "keep the config file value"
const envSchema = z.object({
  OLLAMA_URL: z.string().url().optional(),
  FILTER_PROXY_HOST: z.string().min(1).optional(),
  FILTER_PROXY_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  FILTER_MODELS: z
    .string()
    .transform(value => value.split(',').map(model => model.trim()).filter(model => model.length > 0))
    .optional(),
  FILTER_DETAILED_LOGGING: booleanFlag.optional(),
  FILTER_SHOW_FULL_CONTENT: booleanFlag.optional(),
  FILTER_MAX_PREVIEW_LENGTH: z.coerce.number().int().nonnegative().optional(),
  FILTER_LOGS_PATH: z.string().min(1).optional(),
  FILTER_CONFIG_PATH: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse the proxy's environment variables. Invalid variables are reported
 * and dropped; the valid ones still apply.
 */
export function parseEnv(source: EnvSource = process.env): EnvConfig {
  const result = envSchema.safeParse(source);
  if (result.success) {
    return result.data;
  }

  const invalid = new Set<string>();
  console.warn('⚠️  Environment variable validation errors:');
  result.error.errors.forEach((err) => {
    console.warn(`   ${err.path.join('.')}: ${err.message}`);
    invalid.add(String(err.path[0]));
  });
  console.warn('   Ignoring invalid environment variables.');

  const filtered: EnvSource = {};
  for (const key of Object.keys(envSchema.shape)) {
    if (!invalid.has(key)) {
      filtered[key] = source[key];
    }
  }
  return envSchema.parse(filtered);
}
