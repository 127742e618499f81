import { z } from 'zod';
import { fileURLToPath } from 'url';
import { getOptionalSecret } from '../utils/secrets.js';
import { ConfigError } from '../utils/errors.js';

type Env = Record<string, string | undefined>;

const bundledDataPath = (file: string): string =>
  fileURLToPath(new URL(`../../data/${file}`, import.meta.url));

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform(v => v === 'true');

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(8000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  cors: z.object({
    origin: z.string().default('http://localhost:8080'),
  }),

  watsonx: z.object({
    apiKey: z.string({ required_error: 'WATSONX_API_KEY is required' }).min(1),
    projectId: z.string({ required_error: 'WATSONX_PROJECT_ID is required' }).min(1),
    baseUrl: z.string({ required_error: 'WATSONX_URL is required' })
      .url()
      .transform(url => url.replace(/\/+$/, '')),
    iamUrl: z.string().url().default('https://iam.cloud.ibm.com/identity/token'),
    modelId: z.string().min(1).default('ibm/granite-3-8b-instruct'),
    apiVersion: z.string().min(1).default('2024-03-14'),
    iamTimeoutMs: z.coerce.number().int().positive().default(5000),
    modelTimeoutMs: z.coerce.number().int().positive().default(30000),
    tokenSafetyMarginMs: z.coerce.number().int().nonnegative().default(60000),
  }),

  advisory: z.object({
    exposeRawUpstream: booleanFlag,
  }),

  data: z.object({
    waterDataPath: z.string().default(bundledDataPath('water-data.json')),
    simulatedResponsesPath: z.string().default(bundledDataPath('simulated-responses.json')),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Build the process configuration from environment variables (and Docker secrets).
 * Throws ConfigError naming every missing or invalid key.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,

    cors: {
      origin: env.CORS_ORIGIN,
    },

    watsonx: {
      apiKey: getOptionalSecret('watsonx_api_key', 'WATSONX_API_KEY', env),
      projectId: env.WATSONX_PROJECT_ID,
      baseUrl: env.WATSONX_URL,
      iamUrl: env.WATSONX_IAM_URL,
      modelId: env.WATSONX_MODEL_ID,
      apiVersion: env.WATSONX_API_VERSION,
      iamTimeoutMs: env.WATSONX_IAM_TIMEOUT_MS,
      modelTimeoutMs: env.WATSONX_MODEL_TIMEOUT_MS,
      tokenSafetyMarginMs: env.WATSONX_TOKEN_SAFETY_MARGIN_MS,
    },

    advisory: {
      exposeRawUpstream: env.ADVISORY_EXPOSE_RAW,
    },

    data: {
      waterDataPath: env.WATER_DATA_PATH,
      simulatedResponsesPath: env.SIMULATED_RESPONSES_PATH,
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return parsed.data;
}
