import { BackendError } from './errors.js';
import { isRecord, requestJson } from './http.js';
import type { BackendClient, CompletionRequest } from './llm.js';

export type OllamaSettings = {
  url: string;
  model: string;
  timeoutMs: number;
};

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434/api/generate';
export const DEFAULT_OLLAMA_MODEL = 'llama3.2';

function extractText(data: unknown): string {
  if (!isRecord(data)) return '';
  const t = data.response;
  return typeof t === 'string' ? t.trim() : '';
}

// /api/generate takes a single prompt, so the two roles are flattened.
export function messagesToPrompt(systemPrompt: string, userPrompt: string): string {
  return [`System: ${systemPrompt}`, `User: ${userPrompt}`].join('\n\n');
}

export class OllamaClient implements BackendClient {
  readonly kind = 'local' as const;
  readonly settings: OllamaSettings;

  constructor(settings: Partial<OllamaSettings> = {}) {
    this.settings = {
      url: settings.url || DEFAULT_OLLAMA_URL,
      model: settings.model || DEFAULT_OLLAMA_MODEL,
      timeoutMs: settings.timeoutMs ?? 300_000,
    };
  }

  async complete({ systemPrompt, userPrompt, temperature, maxTokens }: CompletionRequest): Promise<string> {
    const { status, data } = await requestJson(
      'Ollama',
      this.settings.url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.settings.model,
          prompt: messagesToPrompt(systemPrompt, userPrompt),
          stream: false,
          options: { temperature, num_predict: maxTokens },
        }),
      },
      this.settings.timeoutMs
    );

    const text = extractText(data);
    if (!text) throw new BackendError('Ollama returned an empty response', status);
    return text;
  }
}
