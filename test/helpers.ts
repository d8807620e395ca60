import { ClientCache } from '../src/lib/client-cache.js';
import type { BackendClient, BackendKind, CompletionRequest } from '../src/lib/llm.js';

export type Responder = (req: CompletionRequest) => string | Promise<string>;

export class FakeBackend implements BackendClient {
  readonly calls: CompletionRequest[] = [];

  constructor(
    readonly kind: BackendKind,
    private readonly respond: Responder
  ) {}

  async complete(req: CompletionRequest): Promise<string> {
    this.calls.push(req);
    return this.respond(req);
  }
}

// Every client the cache creates shares one responder.
export function fakeCache(respond: Responder) {
  const backends: FakeBackend[] = [];
  const cache = new ClientCache(async (kind) => {
    const b = new FakeBackend(kind, respond);
    backends.push(b);
    return b;
  });
  return { cache, backends };
}

// Reviewer, narrative and comment requests differ by token budget.
export const isReviewerCall = (req: CompletionRequest) => req.maxTokens === 2000;
export const isNarrativeCall = (req: CompletionRequest) => req.maxTokens === 3000;
export const isCommentsCall = (req: CompletionRequest) => req.maxTokens === 4000;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
