import { z } from 'zod';
import { ConfigurationError } from '../errors';
import {
  AUDIO_DEFAULTS,
  CONVERSATION_DEFAULTS,
  LIMIT_DEFAULTS,
  LOGGING_DEFAULTS,
  SERVER_DEFAULTS,
  SPEECH_DEFAULTS,
  UPSTREAM_DEFAULTS
} from './defaults';
import { type GatewayConfig } from './types';

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const csv = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const positiveInt = z.coerce.number().int().positive();
const positiveNumber = z.coerce.number().positive();

const EnvSchema = z.object({
  HOST: z.string().default(SERVER_DEFAULTS.HOST),
  PORT: z.coerce.number().int().min(1).max(65_535).default(SERVER_DEFAULTS.PORT),
  PUBLIC_BASE_URL: z.string().url().optional(),
  TRUST_PROXY: flag.default('false'),
  ALLOWED_ORIGINS: csv.default(SERVER_DEFAULTS.ALLOWED_ORIGINS),

  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default(LOGGING_DEFAULTS.LEVEL),
  LOG_PRETTY: flag.optional(),

  REQUIRE_AUTH: flag.default('false'),
  API_KEYS: csv.default(''),

  RATE_LIMIT_PER_MINUTE: positiveInt.default(LIMIT_DEFAULTS.PER_ADDRESS_PER_MINUTE),
  RATE_LIMIT_PER_API_KEY: positiveInt.default(LIMIT_DEFAULTS.PER_CREDENTIAL_PER_MINUTE),
  MAX_IMAGE_SIZE_MB: positiveNumber.default(LIMIT_DEFAULTS.MAX_IMAGE_SIZE_MB),
  CONVERSATION_TTL_SECONDS: positiveInt.default(CONVERSATION_DEFAULTS.TTL_SECONDS),
  MAX_CONVERSATION_TURNS: positiveInt.default(CONVERSATION_DEFAULTS.MAX_TURNS),

  MODEL_TIMEOUT_SECONDS: positiveNumber.default(UPSTREAM_DEFAULTS.MODEL_TIMEOUT_SECONDS),
  TTS_TIMEOUT_SECONDS: positiveNumber.default(UPSTREAM_DEFAULTS.SPEECH_TIMEOUT_SECONDS),

  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  QWEN_API_KEY: z.string().optional(),
  DOUBAO_API_KEY: z.string().optional(),
  GLM_API_KEY: z.string().optional(),

  TTS_PROVIDER: z.enum(['openai', 'azure', 'google', 'none']).optional(),
  TTS_OPENAI_MODEL: z.string().default(SPEECH_DEFAULTS.OPENAI_MODEL),
  AZURE_TTS_KEY: z.string().optional(),
  AZURE_TTS_REGION: z.string().optional(),
  GOOGLE_TTS_API_KEY: z.string().optional(),

  AUDIO_DIR: z.string().default(AUDIO_DEFAULTS.DIRECTORY),
  AUDIO_EXPIRATION_HOURS: positiveNumber.default(AUDIO_DEFAULTS.EXPIRATION_HOURS)
});

type GatewayEnv = z.infer<typeof EnvSchema>;

function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

function crossFieldIssues(env: GatewayEnv): string[] {
  const issues: string[] = [];

  if (env.REQUIRE_AUTH && env.API_KEYS.length === 0) {
    issues.push('REQUIRE_AUTH is enabled but API_KEYS is empty');
  }
  if (env.TTS_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
    issues.push('TTS_PROVIDER=openai requires OPENAI_API_KEY');
  }
  if (env.TTS_PROVIDER === 'azure' && (!env.AZURE_TTS_KEY || !env.AZURE_TTS_REGION)) {
    issues.push('TTS_PROVIDER=azure requires AZURE_TTS_KEY and AZURE_TTS_REGION');
  }
  if (env.TTS_PROVIDER === 'google' && !env.GOOGLE_TTS_API_KEY) {
    issues.push('TTS_PROVIDER=google requires GOOGLE_TTS_API_KEY');
  }

  return issues;
}

function resolveSpeechProvider(env: GatewayEnv): GatewayConfig['speech']['defaultProvider'] {
  if (env.TTS_PROVIDER === 'none') {
    return null;
  }
  if (env.TTS_PROVIDER) {
    return env.TTS_PROVIDER;
  }
  return env.OPENAI_API_KEY ? 'openai' : null;
}

/**
 * Builds the gateway configuration from environment variables, applying
 * defaults. Throws a ConfigurationError listing every problem found.
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const issues = crossFieldIssues(values);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return {
    server: {
      host: values.HOST,
      port: values.PORT,
      publicBaseUrl: (values.PUBLIC_BASE_URL ?? `http://localhost:${values.PORT}`).replace(/\/+$/, ''),
      trustProxy: values.TRUST_PROXY,
      allowedOrigins: values.ALLOWED_ORIGINS
    },
    logging: {
      level: values.LOG_LEVEL,
      pretty: values.LOG_PRETTY ?? LOGGING_DEFAULTS.PRETTY_PRINT
    },
    auth: {
      requireAuth: values.REQUIRE_AUTH,
      apiKeys: values.API_KEYS
    },
    limits: {
      perAddressPerMinute: values.RATE_LIMIT_PER_MINUTE,
      perCredentialPerMinute: values.RATE_LIMIT_PER_API_KEY,
      windowMs: LIMIT_DEFAULTS.WINDOW_MS,
      sweepIntervalMs: LIMIT_DEFAULTS.SWEEP_INTERVAL_MS,
      maxImageBytes: Math.floor(values.MAX_IMAGE_SIZE_MB * 1024 * 1024)
    },
    conversations: {
      ttlMs: values.CONVERSATION_TTL_SECONDS * 1000,
      maxTurns: values.MAX_CONVERSATION_TURNS,
      sweepIntervalMs: CONVERSATION_DEFAULTS.SWEEP_INTERVAL_MS
    },
    vision: {
      timeoutMs: values.MODEL_TIMEOUT_SECONDS * 1000,
      apiKeys: {
        openai: values.OPENAI_API_KEY,
        claude: values.ANTHROPIC_API_KEY,
        gemini: values.GEMINI_API_KEY,
        qwen: values.QWEN_API_KEY,
        doubao: values.DOUBAO_API_KEY,
        glm: values.GLM_API_KEY
      }
    },
    speech: {
      defaultProvider: resolveSpeechProvider(values),
      timeoutMs: values.TTS_TIMEOUT_SECONDS * 1000,
      openai: { apiKey: values.OPENAI_API_KEY, model: values.TTS_OPENAI_MODEL },
      azure: { apiKey: values.AZURE_TTS_KEY, region: values.AZURE_TTS_REGION },
      google: { apiKey: values.GOOGLE_TTS_API_KEY }
    },
    audio: {
      directory: values.AUDIO_DIR,
      expirationMs: values.AUDIO_EXPIRATION_HOURS * 3_600_000,
      sweepIntervalMs: AUDIO_DEFAULTS.SWEEP_INTERVAL_MS
    }
  };
}
