import * as core from '@actions/core';

import type { BackendClient, BackendFactory, BackendKind } from './llm.js';

export function cacheKey(name: string, kind: BackendKind, temperature: number): string {
  return `${name}_${kind}_${temperature}`;
}

/**
 * One shared backend client per (consumer, backend kind, temperature).
 *
 * The creation promise is stored before the first await, so two callers that
 * race on the same key always receive the same instance. A creation that
 * fails is evicted; the next acquire starts over.
 */
export class ClientCache {
  private readonly entries = new Map<string, Promise<BackendClient>>();

  constructor(private readonly factory: BackendFactory) {}

  acquire(name: string, kind: BackendKind, temperature: number): Promise<BackendClient> {
    const key = cacheKey(name, kind, temperature);
    const existing = this.entries.get(key);
    if (existing) {
      core.debug(`Using cached LLM instance: ${key}`);
      return existing;
    }

    core.info(`Creating new LLM instance: ${key}`);
    const created = this.factory(kind).catch((err: unknown) => {
      if (this.entries.get(key) === created) this.entries.delete(key);
      throw err;
    });
    this.entries.set(key, created);
    return created;
  }

  clear(): void {
    this.entries.clear();
    core.info('LLM instance cache cleared');
  }

  info(): { keys: string[]; count: number } {
    return { keys: [...this.entries.keys()], count: this.entries.size };
  }
}
