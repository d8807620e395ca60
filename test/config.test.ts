import * as core from '@actions/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { clampTemperature, loadConfig, parseBool, parseCsvList } from '../src/lib/config.js';

vi.mock('@actions/core');

const ENV_KEYS = [
  'USE_LOCAL_LLM',
  'REVIEW_TEMPERATURE',
  'REVIEW_AGENTS',
  'REVIEW_PARALLEL',
  'REVIEW_TIMEOUT_MS',
  'REVIEW_REQUEST_TIMEOUT_MS',
  'REVIEW_MAX_RETRIES',
  'OLLAMA_URL',
  'OLLAMA_MODEL',
  'AZURE_TENANT_ID',
  'AZURE_CLIENT_ID',
  'AZURE_CLIENT_SECRET',
  'AZURE_OPENAI_ENDPOINT',
];

beforeEach(() => {
  vi.mocked(core.getInput).mockReturnValue('');
  for (const k of ENV_KEYS) vi.stubEnv(k, '');
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('parsers', () => {
  it('splits csv lists', () => {
    expect(parseCsvList(' security, ,style ,')).toEqual(['security', 'style']);
    expect(parseCsvList('')).toEqual([]);
  });

  it('reads booleans with a fallback', () => {
    expect(parseBool('TRUE', false)).toBe(true);
    expect(parseBool('no', true)).toBe(false);
    expect(parseBool('  ', true)).toBe(true);
  });

  it('clamps temperature to [0, 1]', () => {
    expect(clampTemperature(1.7)).toBe(1);
    expect(clampTemperature(-0.2)).toBe(0);
    expect(clampTemperature(0.4)).toBe(0.4);
  });
});

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig()).toMatchObject({
      backend: 'hosted',
      temperature: 0.1,
      parallel: true,
      timeoutMs: 360_000,
      maxRetries: 3,
    });
    expect(loadConfig().agents).toBeUndefined();
  });

  it('hands the reviewer timeout to the backend clients', () => {
    vi.stubEnv('REVIEW_TIMEOUT_MS', '90000');
    const config = loadConfig();
    expect(config.timeoutMs).toBe(90_000);
    expect(config.backendSettings.timeoutMs).toBe(90_000);
  });

  it('takes a separate per-request timeout', () => {
    vi.stubEnv('REVIEW_TIMEOUT_MS', '90000');
    vi.stubEnv('REVIEW_REQUEST_TIMEOUT_MS', '15000');
    const config = loadConfig();
    expect(config.timeoutMs).toBe(90_000);
    expect(config.backendSettings.timeoutMs).toBe(15_000);
  });

  it('reads environment variables', () => {
    vi.stubEnv('USE_LOCAL_LLM', 'true');
    vi.stubEnv('REVIEW_TEMPERATURE', '1.7');
    vi.stubEnv('REVIEW_AGENTS', 'security, style');
    vi.stubEnv('REVIEW_PARALLEL', 'false');
    vi.stubEnv('REVIEW_MAX_RETRIES', '0');
    vi.stubEnv('REVIEW_TIMEOUT_MS', 'soon');
    vi.stubEnv('OLLAMA_MODEL', 'test-model');

    const config = loadConfig();
    expect(config).toMatchObject({
      backend: 'local',
      temperature: 1,
      agents: ['security', 'style'],
      parallel: false,
      maxRetries: 1,
      timeoutMs: 360_000,
    });
    expect(config.backendSettings.local?.model).toBe('test-model');
  });

  it('prefers action inputs over the environment', () => {
    vi.stubEnv('REVIEW_TEMPERATURE', '0.9');
    vi.stubEnv('AZURE_CLIENT_SECRET', 'test-secret');
    vi.mocked(core.getInput).mockImplementation((name) => (name === 'temperature' ? '0.4' : ''));

    const config = loadConfig();
    expect(config.temperature).toBe(0.4);
    expect(config.backendSettings.hosted?.clientSecret).toBe('test-secret');
  });
});
