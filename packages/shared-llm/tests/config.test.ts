import { describe, it, expect } from 'vitest';
import {
  PRESETS,
  createGuardrailConfig,
  loadGuardrailConfig,
  sanitizeGuardrailConfig,
} from '../src/guardrails/config.js';

describe('loadGuardrailConfig', () => {
  it('defaults to the balanced preset', () => {
    const config = loadGuardrailConfig({});
    expect(config).toEqual({
      enabled: true,
      preset: 'balanced',
      threshold: 0.7,
      blockHighConfidence: true,
      warnMediumConfidence: true,
      logAllEvaluations: false,
      evaluationTimeoutSeconds: 8,
      hardBlockConfidence: 0.8,
      warnConfidence: 0.3,
      model: 'deepseek-chat',
      baseUrl: 'https://api.deepseek.com',
    });
  });

  it('loads each preset bundle', () => {
    for (const preset of ['strict', 'balanced', 'lenient', 'monitoring_only'] as const) {
      const config = loadGuardrailConfig({ GUARDRAIL_PRESET: preset });
      expect(config.preset).toBe(preset);
      expect(config.threshold).toBe(PRESETS[preset].threshold);
      expect(config.blockHighConfidence).toBe(PRESETS[preset].blockHighConfidence);
      expect(config.warnMediumConfidence).toBe(PRESETS[preset].warnMediumConfidence);
      expect(config.evaluationTimeoutSeconds).toBe(PRESETS[preset].evaluationTimeoutSeconds);
    }
  });

  it('accepts preset names case-insensitively', () => {
    expect(loadGuardrailConfig({ GUARDRAIL_PRESET: ' Strict ' }).preset).toBe('strict');
  });

  it('falls back to balanced for an unknown preset', () => {
    const config = loadGuardrailConfig({ GUARDRAIL_PRESET: 'paranoid' });
    expect(config.preset).toBe('balanced');
    expect(config.threshold).toBe(0.7);
  });

  it('lets explicit env vars override preset fields', () => {
    const config = loadGuardrailConfig({
      GUARDRAIL_PRESET: 'lenient',
      GUARDRAIL_THRESHOLD: '0.6',
      GUARDRAIL_BLOCK_HIGH: 'yes',
      GUARDRAIL_LOG_ALL: 'on',
      GUARDRAIL_TIMEOUT: '12',
    });
    expect(config.threshold).toBe(0.6);
    expect(config.blockHighConfidence).toBe(true);
    expect(config.logAllEvaluations).toBe(true);
    expect(config.evaluationTimeoutSeconds).toBe(12);
  });

  it('reads the enable flag', () => {
    expect(loadGuardrailConfig({ GUARDRAIL_ENABLED: 'false' }).enabled).toBe(false);
    expect(loadGuardrailConfig({ GUARDRAIL_ENABLED: '0' }).enabled).toBe(false);
    expect(loadGuardrailConfig({ GUARDRAIL_ENABLED: 'garbage' }).enabled).toBe(true);
  });

  it('clamps out-of-range numbers', () => {
    const config = loadGuardrailConfig({
      GUARDRAIL_THRESHOLD: '1.7',
      GUARDRAIL_TIMEOUT: '120',
      GUARDRAIL_HARD_BLOCK_CONFIDENCE: '-2',
    });
    expect(config.threshold).toBe(1);
    expect(config.evaluationTimeoutSeconds).toBe(30);
    expect(config.hardBlockConfidence).toBe(0);

    expect(loadGuardrailConfig({ GUARDRAIL_TIMEOUT: '0' }).evaluationTimeoutSeconds).toBe(1);
  });

  it('ignores unparseable numbers', () => {
    const config = loadGuardrailConfig({ GUARDRAIL_THRESHOLD: 'high', GUARDRAIL_WARN_CONFIDENCE: '' });
    expect(config.threshold).toBe(0.7);
    expect(config.warnConfidence).toBe(0.3);
  });

  it('reads model and endpoint', () => {
    const config = loadGuardrailConfig({
      GUARDRAIL_MODEL: 'assessor-small',
      GUARDRAIL_LLM_BASE_URL: 'https://assessor.example.com',
    });
    expect(config.model).toBe('assessor-small');
    expect(config.baseUrl).toBe('https://assessor.example.com');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadGuardrailConfig({}))).toBe(true);
  });
});

describe('createGuardrailConfig', () => {
  it('starts from the named preset and applies overrides', () => {
    const config = createGuardrailConfig({ preset: 'strict', logAllEvaluations: false });
    expect(config.threshold).toBe(0.5);
    expect(config.logAllEvaluations).toBe(false);
  });

  it('sanitizes overrides', () => {
    expect(createGuardrailConfig({ warnConfidence: 3 }).warnConfidence).toBe(1);
  });
});

describe('sanitizeGuardrailConfig', () => {
  it('keeps in-range values', () => {
    const config = createGuardrailConfig();
    expect(sanitizeGuardrailConfig(config)).toEqual(config);
  });
});
