/**
 * Default constants for the gateway configuration
 */

/**
 * HTTP server
 */
export const SERVER_DEFAULTS = {
  HOST: '0.0.0.0',
  PORT: 8000,
  /** Prefix of the audio locators handed to clients */
  PUBLIC_BASE_URL: 'http://localhost:8000',
  /** Comma-separated browser origins; `*` allows any */
  ALLOWED_ORIGINS: '*'
} as const;

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  LEVEL: 'info',
  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production'
} as const;

/**
 * Admission control
 */
export const LIMIT_DEFAULTS = {
  PER_ADDRESS_PER_MINUTE: 60,
  PER_CREDENTIAL_PER_MINUTE: 100,
  WINDOW_MS: 60_000,
  SWEEP_INTERVAL_MS: 300_000,
  MAX_IMAGE_SIZE_MB: 1
} as const;

export const CONVERSATION_DEFAULTS = {
  TTL_SECONDS: 1_800,
  /** User+assistant pairs kept per conversation */
  MAX_TURNS: 10,
  SWEEP_INTERVAL_MS: 60_000
} as const;

export const UPSTREAM_DEFAULTS = {
  MODEL_TIMEOUT_SECONDS: 30,
  SPEECH_TIMEOUT_SECONDS: 10,
  PROBE_TIMEOUT_MS: 10_000,
  MAX_OUTPUT_TOKENS: 1_000
} as const;

export const SPEECH_DEFAULTS = {
  OPENAI_MODEL: 'tts-1',
  OPENAI_VOICE: 'alloy',
  AZURE_VOICE: 'en-US-JennyNeural',
  GOOGLE_VOICE: 'en-US-Neural2-C',
  GOOGLE_LANGUAGE: 'en-US',
  SPEED: 1.0,
  MIN_SPEED: 0.5,
  MAX_SPEED: 2.0,
  MAX_TEXT_LENGTH: 5_000
} as const;

export const AUDIO_DEFAULTS = {
  DIRECTORY: './data/audio',
  EXPIRATION_HOURS: 24,
  SWEEP_INTERVAL_MS: 3_600_000
} as const;
