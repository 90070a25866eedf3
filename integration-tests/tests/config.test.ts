/**
 * Configuration parsing
 */

import { FIELD_NAMES, getValidationSettings, loadConfig } from '@vpncheck/shared';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const cfg = loadConfig({});

    expect(cfg.minSignatures).toBe(3);
    expect(cfg.maxFileSizeMb).toBe(10);
    expect(cfg.requiredEmailDomain).toBe('@infomedia.co.id');
    expect(cfg.requiredFields).toEqual([...FIELD_NAMES]);
    expect(cfg.judgeProvider).toBe('rules');
    expect(cfg.llmModelJudge).toBe('gpt-4o-mini');
    expect(cfg.judgeMaxRetries).toBe(1);
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it('selects OpenAI when an API key is present', () => {
    expect(loadConfig({ OPENAI_API_KEY: 'test-key' }).judgeProvider).toBe('openai');
  });

  it('reads numeric overrides', () => {
    const cfg = loadConfig({ MIN_SIGNATURES: '2', MAX_FILE_SIZE_MB: '5', JUDGE_TIMEOUT_MS: '1500' });

    expect(cfg.minSignatures).toBe(2);
    expect(cfg.maxFileSizeMb).toBe(5);
    expect(cfg.judgeTimeoutMs).toBe(1500);
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ MIN_SIGNATURES: 'three' })).toThrow(
      'Invalid MIN_SIGNATURES: expected an integer >= 0, got "three"'
    );
    expect(() => loadConfig({ MAX_FILE_SIZE_MB: '0' })).toThrow('Invalid MAX_FILE_SIZE_MB');
  });

  it('parses and de-duplicates the required field list', () => {
    expect(loadConfig({ REQUIRED_FIELDS: 'NIK, Email,NIK' }).requiredFields).toEqual(['NIK', 'Email']);
  });

  it('rejects unknown field names', () => {
    expect(() => loadConfig({ REQUIRED_FIELDS: 'NIK,Salary' })).toThrow('Unknown field(s) in REQUIRED_FIELDS: Salary');
  });

  it('rejects an unknown judge provider', () => {
    expect(() => loadConfig({ JUDGE_PROVIDER: 'oracle' })).toThrow('Invalid JUDGE_PROVIDER');
  });
});

describe('getValidationSettings', () => {
  it('derives the frozen core settings', () => {
    const settings = getValidationSettings(loadConfig({ MAX_FILE_SIZE_MB: '2', REQUIRED_FIELDS: 'Email' }));

    expect(settings).toEqual({
      minSignatures: 3,
      maxFileSizeBytes: 2 * 1024 * 1024,
      requiredEmailDomain: '@infomedia.co.id',
      requiredFields: ['Email'],
    });
    expect(Object.isFrozen(settings)).toBe(true);
  });
});
