import path from 'path';

const BACKEND_ROOT = path.resolve(__dirname, '..', '..');

export type DatabaseType = 'better-sqlite3' | 'postgres';

export const TTS_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
export type TtsVoice = (typeof TTS_VOICES)[number];

function isTtsVoice(value: string): value is TtsVoice {
  return TTS_VOICES.some((voice) => voice === value);
}

function splitCsv(value?: string): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function isProductionEnv(): boolean {
  return process.env.NODE_ENV === 'production';
}

export function isTestEnv(): boolean {
  return process.env.NODE_ENV === 'test';
}

export function getAllowedCorsOrigins(): string[] {
  const fromCsv = splitCsv(process.env.CORS_ALLOWED_ORIGINS);
  if (fromCsv.length > 0) {
    return fromCsv;
  }
  return [process.env.FRONTEND_URL || 'http://localhost:5173'];
}

/**
 * Express `trust proxy` value from TRUST_PROXY: a hop count, `true`/`false`,
 * or a comma-separated list of trusted addresses. Unset trusts no proxy.
 */
export function getTrustProxy(): boolean | number | string {
  const value = process.env.TRUST_PROXY?.trim();
  if (!value || value === 'false') return false;
  if (value === 'true') return true;
  if (/^\d+$/.test(value)) return Number(value);
  return value;
}

export function getAppPort(): number {
  return Number(process.env.APP_PORT || process.env.PORT || 8001);
}

export function getDatabaseType(): DatabaseType {
  return process.env.DB_TYPE === 'postgres' ? 'postgres' : 'better-sqlite3';
}

export function getOpenAIApiKey(): string | null {
  const key = process.env.OPENAI_API_KEY?.trim();
  return key ? key : null;
}

export function getAnalysisModel(): string {
  return process.env.OPENAI_ANALYSIS_MODEL || 'gpt-4o-mini';
}

export function getAnalysisMaxRetries(): number {
  return readPositiveInt(process.env.ANALYSIS_MAX_RETRIES, 3);
}

export function getAnalysisRetryDelayMs(): number {
  return readPositiveInt(process.env.ANALYSIS_RETRY_DELAY_MS, 1000);
}

export function getAnalysisTimeoutMs(): number {
  return readPositiveInt(process.env.ANALYSIS_TIMEOUT_MS, 60_000);
}

export function getTtsModel(): string {
  return process.env.OPENAI_TTS_MODEL || 'tts-1';
}

export function getTtsVoice(): TtsVoice {
  const voice = process.env.OPENAI_TTS_VOICE;
  return voice && isTtsVoice(voice) ? voice : 'alloy';
}

export function getAudioCacheDir(): string {
  return path.resolve(process.env.AUDIO_CACHE_DIR || path.join(BACKEND_ROOT, 'audio_cache'));
}

export function getVocabularyFilePath(): string {
  return path.resolve(process.env.VOCABULARY_FILE || path.join(BACKEND_ROOT, 'data', 'vocabulary.txt'));
}

export function getDefaultTemplatePath(): string {
  return path.resolve(
    process.env.DEFAULT_TEMPLATE_PATH || path.join(BACKEND_ROOT, 'templates', 'word_template.md')
  );
}

export function getApiRateLimit(): number {
  return readPositiveInt(process.env.RATE_LIMIT_MAX, 120);
}

export function assertProductionEnv(): void {
  if (!isProductionEnv()) return;
  if (!getOpenAIApiKey()) {
    throw new Error('OPENAI_API_KEY is required in production');
  }
}
