import * as core from '@actions/core';

import type { BackendKind, BackendSettings } from './llm.js';

export type ReviewPanelConfig = {
  backend: BackendKind;
  temperature: number;
  agents?: string[];
  parallel: boolean;
  timeoutMs: number;
  maxRetries: number;
  backendSettings: BackendSettings;
};

export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_TIMEOUT_MS = 360_000;
export const DEFAULT_MAX_RETRIES = 3;

export function parseCsvList(s: string): string[] {
  return (s || '')
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
}

export function parseBool(s: string, fallback: boolean): boolean {
  const v = s.trim().toLowerCase();
  if (!v) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v);
}

export function parseNumber(s: string, fallback: number): number {
  if (!s.trim()) return fallback;
  const n = Number(s);
  if (!Number.isFinite(n)) {
    core.warning(`Ignoring non-numeric setting "${s}"`);
    return fallback;
  }
  return n;
}

export function clampTemperature(t: number): number {
  return Math.min(1, Math.max(0, t));
}

// Action input first, then the environment variable.
function setting(input: string, env: string): string {
  return core.getInput(input) || process.env[env] || '';
}

export function loadConfig(): ReviewPanelConfig {
  const agents = parseCsvList(setting('agents', 'REVIEW_AGENTS'));
  const timeoutMs = parseNumber(setting('timeout_ms', 'REVIEW_TIMEOUT_MS'), DEFAULT_TIMEOUT_MS);

  return {
    backend: parseBool(setting('use_local_llm', 'USE_LOCAL_LLM'), false) ? 'local' : 'hosted',
    temperature: clampTemperature(parseNumber(setting('temperature', 'REVIEW_TEMPERATURE'), DEFAULT_TEMPERATURE)),
    ...(agents.length ? { agents } : {}),
    parallel: parseBool(setting('parallel', 'REVIEW_PARALLEL'), true),
    timeoutMs,
    maxRetries: Math.max(1, Math.floor(parseNumber(setting('max_retries', 'REVIEW_MAX_RETRIES'), DEFAULT_MAX_RETRIES))),
    backendSettings: {
      // Each backend request defaults to the reviewer timeout.
      timeoutMs: parseNumber(setting('request_timeout_ms', 'REVIEW_REQUEST_TIMEOUT_MS'), timeoutMs),
      local: {
        url: setting('ollama_url', 'OLLAMA_URL'),
        model: setting('ollama_model', 'OLLAMA_MODEL'),
      },
      hosted: {
        tenantId: setting('azure_tenant_id', 'AZURE_TENANT_ID'),
        clientId: setting('azure_client_id', 'AZURE_CLIENT_ID'),
        clientSecret: setting('azure_client_secret', 'AZURE_CLIENT_SECRET'),
        endpoint: setting('azure_endpoint', 'AZURE_OPENAI_ENDPOINT'),
        tokenUrl: setting('azure_token_url', 'AZURE_TOKEN_URL'),
        chatUrl: setting('azure_chat_url', 'AZURE_OPENAI_CHAT_URL'),
        deployment: setting('azure_deployment', 'AZURE_OPENAI_DEPLOYMENT'),
        apiVersion: setting('azure_api_version', 'AZURE_OPENAI_API_VERSION'),
      },
    },
  };
}
