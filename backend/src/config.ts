import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const backendDir = path.resolve(__dirname, '..');

// Search for .env file walking up directory tree from multiple starting points
const searchDirs = [
  __dirname,                          // backend/src/
  backendDir,                         // backend/
  path.resolve(__dirname, '../..'),   // repository root
  process.cwd(),
  path.resolve(process.cwd(), '..'),
];

export function loadDotEnv(): boolean {
  for (const dir of searchDirs) {
    const envPath = path.resolve(dir, '.env');
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
      return true;
    }
  }
  return false;
}

export type OcrEngine = 'paddle' | 'claude' | 'none';

export interface AppConfig {
  port: number;
  anthropicApiKey: string;
  anthropicModel: string;
  ocrEngine: string;
  ocrServiceUrl: string;
  ocrTimeoutMs: number;
  enrichmentEnabled: boolean;
  enrichDebug: boolean;
  enrichCacheDir: string;
  enrichCacheTtlHours: number;
  enrichRequestsPerSecond: number;
  switchGroupOnHeader: boolean;
  uploadsDir: string;
  maxFileSizeMB: number;
}

type Env = Record<string, string | undefined>;

export function envFlag(value: string | undefined): boolean {
  return ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase());
}

function envNumber(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: Env): AppConfig {
  return {
    port: Math.floor(envNumber(env.PORT, 3001)),
    anthropicApiKey: (env.ANTHROPIC_API_KEY ?? '').trim(),
    anthropicModel: (env.ANTHROPIC_MODEL ?? '').trim() || 'claude-sonnet-4-20250514',
    ocrEngine: (env.OCR_ENGINE ?? '').trim().toLowerCase() || 'none',
    ocrServiceUrl: (env.OCR_SERVICE_URL ?? '').trim(),
    ocrTimeoutMs: envNumber(env.OCR_TIMEOUT_MS, 30_000),
    enrichmentEnabled: envFlag(env.ENABLE_ENRICHMENT),
    enrichDebug: envFlag(env.ENRICH_DEBUG),
    enrichCacheDir: env.ENRICH_CACHE_DIR?.trim() || path.resolve(backendDir, '.cache/enrichment'),
    enrichCacheTtlHours: envNumber(env.ENRICH_CACHE_TTL_HOURS, 24 * 7),
    enrichRequestsPerSecond: envNumber(env.ENRICH_REQUESTS_PER_SECOND, 2),
    switchGroupOnHeader: envFlag(env.MENU_SWITCH_GROUPS),
    uploadsDir: env.UPLOADS_DIR?.trim() || path.resolve(backendDir, 'uploads'),
    maxFileSizeMB: envNumber(env.MAX_FILE_SIZE_MB, 20),
  };
}

export function isOcrEngine(value: string): value is OcrEngine {
  return value === 'paddle' || value === 'claude' || value === 'none';
}

/** Startup problems: `errors` stop the server, `warnings` only get logged. */
export function checkConfig(cfg: AppConfig): { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isOcrEngine(cfg.ocrEngine)) {
    errors.push(`OCR_ENGINE must be one of paddle, claude, none (got "${cfg.ocrEngine}").`);
  } else if (cfg.ocrEngine === 'paddle' && !cfg.ocrServiceUrl) {
    errors.push('OCR_SERVICE_URL is required when OCR_ENGINE=paddle.');
  } else if (cfg.ocrEngine === 'claude' && !cfg.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required when OCR_ENGINE=claude.');
  } else if (cfg.ocrEngine === 'none') {
    warnings.push('OCR_ENGINE=none: image uploads will return no wines.');
  }

  if (cfg.enrichmentEnabled && !cfg.anthropicApiKey) {
    warnings.push('ENABLE_ENRICHMENT is set but ANTHROPIC_API_KEY is missing; enrichment disabled.');
  }

  return { errors, warnings };
}

if (!loadDotEnv()) {
  // Not an error in production: the platform sets env vars directly
  console.log('No .env file found, using environment variables.');
}

export const config = loadConfig(process.env);

export function validateConfig(cfg: AppConfig = config): void {
  const { errors, warnings } = checkConfig(cfg);
  for (const warning of warnings) console.warn(`WARNING: ${warning}`);
  if (errors.length > 0) {
    for (const error of errors) console.error(`ERROR: ${error}`);
    console.error('Copy .env.example to .env and fix the settings above.');
    process.exit(1);
  }
}
