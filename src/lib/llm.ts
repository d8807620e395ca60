import * as core from '@actions/core';

import { AzureOpenAIClient, type AzureOpenAISettings } from './azure-openai.js';
import { OllamaClient, type OllamaSettings } from './ollama.js';

export type BackendKind = 'local' | 'hosted';

export type CompletionRequest = {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
};

// Both backends resolve to the reply text or reject with BackendError.
export interface BackendClient {
  readonly kind: BackendKind;
  complete(req: CompletionRequest): Promise<string>;
}

export type BackendSettings = {
  local?: Partial<OllamaSettings>;
  hosted?: Partial<AzureOpenAISettings>;
  timeoutMs?: number;
};

export type BackendFactory = (kind: BackendKind) => Promise<BackendClient>;

export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

/**
 * Builds a client for the given backend kind. The hosted client fetches its
 * first token here, so credential problems show up before any review starts.
 */
export async function createBackendClient(kind: BackendKind, settings: BackendSettings = {}): Promise<BackendClient> {
  const timeoutMs = settings.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  if (kind === 'local') {
    core.info('Creating local Ollama client');
    return new OllamaClient({ ...settings.local, timeoutMs });
  }

  core.info('Creating Azure OpenAI client');
  const client = new AzureOpenAIClient({ ...settings.hosted, timeoutMs });
  await client.refreshToken();
  return client;
}

export function backendFactory(settings: BackendSettings = {}): BackendFactory {
  return (kind) => createBackendClient(kind, settings);
}
