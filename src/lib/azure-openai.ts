import * as core from '@actions/core';

import { BackendError, ConfigurationError } from './errors.js';
import { isRecord, requestJson, type JsonReply } from './http.js';
import type { BackendClient, CompletionRequest } from './llm.js';

export type AzureOpenAISettings = {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  endpoint: string;
  tokenUrl: string;
  scope: string;
  chatUrl: string; // full chat-completions URL; overrides endpoint + deployment
  deployment: string;
  apiVersion: string;
  timeoutMs: number;
};

export const DEFAULT_AZURE_SCOPE = 'https://cognitiveservices.azure.com/.default';
export const DEFAULT_AZURE_DEPLOYMENT = 'gpt-4';
export const DEFAULT_AZURE_API_VERSION = '2024-02-15-preview';

function extractText(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) return '';
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return '';
  const t = first.message.content;
  return typeof t === 'string' ? t.trim() : '';
}

function extractToken(data: unknown): string {
  if (!isRecord(data)) return '';
  return typeof data.access_token === 'string' ? data.access_token : '';
}

/**
 * Azure OpenAI chat completions behind an OAuth2 client-credentials token.
 * A 401 triggers one token refresh and one retry of the same request.
 */
export class AzureOpenAIClient implements BackendClient {
  readonly kind = 'hosted' as const;
  readonly tokenUrl: string;
  readonly chatUrl: string;

  private accessToken: string | null = null;
  private pendingRefresh: Promise<string> | null = null;

  constructor(private readonly settings: Partial<AzureOpenAISettings>) {
    const missing: string[] = [];
    if (!settings.clientId) missing.push('clientId');
    if (!settings.clientSecret) missing.push('clientSecret');
    if (!settings.tenantId && !settings.tokenUrl) missing.push('tenantId');
    if (!settings.endpoint && !settings.chatUrl) missing.push('endpoint');
    if (missing.length) {
      throw new ConfigurationError(`Missing Azure credentials: ${missing.join(', ')}`, missing);
    }

    this.tokenUrl =
      settings.tokenUrl || `https://login.microsoftonline.com/${settings.tenantId}/oauth2/v2.0/token`;

    const endpoint = (settings.endpoint ?? '').replace(/\/+$/, '');
    const deployment = settings.deployment || DEFAULT_AZURE_DEPLOYMENT;
    const apiVersion = settings.apiVersion || DEFAULT_AZURE_API_VERSION;
    this.chatUrl =
      settings.chatUrl || `${endpoint}/openai/deployments/${deployment}/chat/completions?api-version=${apiVersion}`;
  }

  private get timeoutMs(): number {
    return this.settings.timeoutMs ?? 300_000;
  }

  get hasToken(): boolean {
    return this.accessToken !== null;
  }

  // Concurrent callers share one in-flight token exchange.
  refreshToken(): Promise<string> {
    if (!this.pendingRefresh) {
      this.pendingRefresh = this.exchangeToken().finally(() => {
        this.pendingRefresh = null;
      });
    }
    return this.pendingRefresh;
  }

  private async exchangeToken(): Promise<string> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.settings.clientId ?? '',
      client_secret: this.settings.clientSecret ?? '',
      scope: this.settings.scope || DEFAULT_AZURE_SCOPE,
    });

    const { status, data } = await requestJson(
      'Azure token',
      this.tokenUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      },
      Math.min(this.timeoutMs, 30_000)
    );

    const token = extractToken(data);
    if (!token) throw new BackendError('No access token received from Azure', status);

    this.accessToken = token;
    core.debug('Azure access token refreshed');
    return token;
  }

  private post(token: string, payload: string): Promise<JsonReply> {
    return requestJson(
      'Azure OpenAI',
      this.chatUrl,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${token}`,
        },
        body: payload,
      },
      this.timeoutMs
    );
  }

  async complete({ systemPrompt, userPrompt, temperature, maxTokens }: CompletionRequest): Promise<string> {
    const payload = JSON.stringify({
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ],
      max_tokens: maxTokens,
      temperature,
      top_p: 0.9,
    });

    const token = this.accessToken ?? (await this.refreshToken());
    let reply: JsonReply;
    try {
      reply = await this.post(token, payload);
    } catch (e) {
      if (!(e instanceof BackendError) || e.status !== 401) throw e;
      core.info('Azure token expired, refreshing...');
      reply = await this.post(await this.refreshToken(), payload);
    }

    const text = extractText(reply.data);
    if (!text) throw new BackendError('Azure OpenAI returned an empty response', reply.status);
    return text;
  }
}
