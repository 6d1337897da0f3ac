import { describe, it, expect } from 'vitest';
import { checkConfig, envFlag, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const cfg = loadConfig({});
    expect(cfg).toMatchObject({
      port: 3001,
      anthropicApiKey: '',
      anthropicModel: 'claude-sonnet-4-20250514',
      ocrEngine: 'none',
      ocrTimeoutMs: 30000,
      enrichmentEnabled: false,
      enrichCacheTtlHours: 168,
      enrichRequestsPerSecond: 2,
      switchGroupOnHeader: false,
      maxFileSizeMB: 20,
    });
    expect(cfg.uploadsDir).toMatch(/uploads$/);
  });

  it('reads overrides', () => {
    const cfg = loadConfig({
      PORT: '8080',
      OCR_ENGINE: ' Paddle ',
      OCR_SERVICE_URL: 'http://localhost:8868/predict/ocr_system',
      OCR_TIMEOUT_MS: 'soon',
      ENABLE_ENRICHMENT: 'yes',
      MENU_SWITCH_GROUPS: '1',
      MAX_FILE_SIZE_MB: '5',
    });
    expect(cfg).toMatchObject({
      port: 8080,
      ocrEngine: 'paddle',
      ocrServiceUrl: 'http://localhost:8868/predict/ocr_system',
      ocrTimeoutMs: 30000,
      enrichmentEnabled: true,
      switchGroupOnHeader: true,
      maxFileSizeMB: 5,
    });
  });
});

describe('envFlag', () => {
  it.each([
    ['1', true],
    ['TRUE', true],
    ['on', true],
    ['0', false],
    ['', false],
    [undefined, false],
  ])('%j -> %s', (value, expected) => {
    expect(envFlag(value)).toBe(expected);
  });
});

describe('checkConfig', () => {
  it('requires a service URL for paddle', () => {
    expect(checkConfig(loadConfig({ OCR_ENGINE: 'paddle' })).errors).toEqual([
      'OCR_SERVICE_URL is required when OCR_ENGINE=paddle.',
    ]);
  });

  it('requires an API key for claude', () => {
    expect(checkConfig(loadConfig({ OCR_ENGINE: 'claude' })).errors).toEqual([
      'ANTHROPIC_API_KEY is required when OCR_ENGINE=claude.',
    ]);
  });

  it('rejects unknown engines', () => {
    expect(checkConfig(loadConfig({ OCR_ENGINE: 'tesseract' })).errors).toEqual([
      'OCR_ENGINE must be one of paddle, claude, none (got "tesseract").',
    ]);
  });

  it('warns when enrichment has no key', () => {
    const { errors, warnings } = checkConfig(loadConfig({ OCR_ENGINE: 'none', ENABLE_ENRICHMENT: 'true' }));
    expect(errors).toEqual([]);
    expect(warnings).toEqual([
      'OCR_ENGINE=none: image uploads will return no wines.',
      'ENABLE_ENRICHMENT is set but ANTHROPIC_API_KEY is missing; enrichment disabled.',
    ]);
  });

  it('passes a complete claude setup', () => {
    const cfg = loadConfig({ OCR_ENGINE: 'claude', ANTHROPIC_API_KEY: 'test-secret', ENABLE_ENRICHMENT: 'on' });
    expect(checkConfig(cfg)).toEqual({ errors: [], warnings: [] });
  });
});
