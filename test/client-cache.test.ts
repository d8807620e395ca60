import { describe, expect, it, vi } from 'vitest';

import { cacheKey, ClientCache } from '../src/lib/client-cache.js';
import { ConfigurationError } from '../src/lib/errors.js';
import type { BackendClient, BackendFactory } from '../src/lib/llm.js';
import { FakeBackend } from './helpers.js';

vi.mock('@actions/core');

const okFactory = () =>
  vi.fn<BackendFactory>(async (kind) => new FakeBackend(kind, () => 'ok'));

describe('ClientCache', () => {
  it('builds keys from name, backend kind and temperature', () => {
    expect(cacheKey('security_agent', 'hosted', 0.2)).toBe('security_agent_hosted_0.2');
  });

  it('hands concurrent callers the same instance', async () => {
    const factory = okFactory();
    const cache = new ClientCache(factory);

    const [a, b] = await Promise.all([
      cache.acquire('security_agent', 'local', 0.2),
      cache.acquire('security_agent', 'local', 0.2),
    ]);

    expect(a).toBe(b);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it('creates one client under many concurrent first acquires', async () => {
    const factory = vi.fn<BackendFactory>(async (kind) => {
      await new Promise<void>((resolve) => setTimeout(resolve, 5));
      return new FakeBackend(kind, () => 'ok');
    });
    const cache = new ClientCache(factory);

    const clients = await Promise.all(
      Array.from({ length: 100 }, () => cache.acquire('security_agent', 'hosted', 0.2))
    );

    expect(new Set(clients).size).toBe(1);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.info()).toEqual({ keys: ['security_agent_hosted_0.2'], count: 1 });
  });

  it('creates a separate instance per temperature', async () => {
    const cache = new ClientCache(okFactory());
    const a = await cache.acquire('x', 'local', 0.2);
    const b = await cache.acquire('x', 'local', 0.5);

    expect(a).not.toBe(b);
    expect(cache.info()).toEqual({ keys: ['x_local_0.2', 'x_local_0.5'], count: 2 });
  });

  it('evicts a failed creation so the next acquire retries', async () => {
    const factory = okFactory();
    factory.mockRejectedValueOnce(new ConfigurationError('Missing Azure credentials: clientId', ['clientId']));
    const cache = new ClientCache(factory);

    await expect(cache.acquire('x', 'hosted', 0.1)).rejects.toBeInstanceOf(ConfigurationError);
    expect(cache.info().count).toBe(0);

    const client: BackendClient = await cache.acquire('x', 'hosted', 0.1);
    expect(client.kind).toBe('hosted');
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('clear drops every entry', async () => {
    const factory = okFactory();
    const cache = new ClientCache(factory);
    await cache.acquire('x', 'local', 0.1);
    cache.clear();

    expect(cache.info()).toEqual({ keys: [], count: 0 });
    await cache.acquire('x', 'local', 0.1);
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
