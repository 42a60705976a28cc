import {
  RegistryError,
  RegistryUnreachableError,
  ResourceNotFoundError,
  TimeoutError
} from '@registry-bridge/core';
import { registryAgentCard } from '@registry-bridge/test-utils';
import { describe, expect, it, type Mock, vi } from 'vitest';
import { type FetchLike, NacosRegistryClient } from './nacos-client.js';

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });

const ok = (data: unknown): Response => json({ code: 0, message: 'success', data });

const makeFetch = (...responses: Array<Response | Error>): Mock<FetchLike> => {
  const fetchMock = vi.fn<FetchLike>();
  for (const response of responses) {
    if (response instanceof Error) {
      fetchMock.mockRejectedValueOnce(response);
    } else {
      fetchMock.mockResolvedValueOnce(response);
    }
  }
  return fetchMock;
};

const requestUrl = (fetchMock: Mock<FetchLike>, call = 0): string =>
  String(fetchMock.mock.calls[call]?.[0]);

const requestInit = (fetchMock: Mock<FetchLike>, call = 0): RequestInit =>
  fetchMock.mock.calls[call]?.[1] ?? {};

describe('NacosRegistryClient', () => {
  describe('getMcpServer', () => {
    it('should fetch and validate a server detail', async () => {
      const fetchMock = makeFetch(
        ok({
          name: 'weather',
          protocol: 'mcp-sse',
          backendEndpoints: [{ address: '10.0.0.5', port: 8080 }],
          toolSpec: { tools: [{ name: 'forecast' }] }
        })
      );
      const client = new NacosRegistryClient({ fetch: fetchMock });

      const detail = await client.getMcpServer('weather');

      expect(detail.toolSpec?.tools).toEqual([{ name: 'forecast' }]);
      expect(requestUrl(fetchMock)).toBe(
        'http://127.0.0.1:8848/nacos/v3/admin/ai/mcp?namespaceId=public&mcpName=weather'
      );
      expect(requestInit(fetchMock).method).toBe('GET');
    });

    it('should pass the version and configured namespace', async () => {
      const fetchMock = makeFetch(ok({ name: 'weather', protocol: 'mcp-sse' }));
      const client = new NacosRegistryClient({
        fetch: fetchMock,
        connection: { serverAddr: 'http://nacos.internal:8848/', namespaceId: 'agents' }
      });

      await client.getMcpServer('weather', '1.2.0');

      expect(requestUrl(fetchMock)).toBe(
        'http://nacos.internal:8848/nacos/v3/admin/ai/mcp?namespaceId=agents&mcpName=weather&version=1.2.0'
      );
    });

    it('should map HTTP 404 to ResourceNotFoundError', async () => {
      const client = new NacosRegistryClient({ fetch: makeFetch(json({}, 404)) });

      await expect(client.getMcpServer('weather')).rejects.toBeInstanceOf(ResourceNotFoundError);
    });

    it('should map the not-found code to ResourceNotFoundError', async () => {
      const client = new NacosRegistryClient({
        fetch: makeFetch(json({ code: 20004, message: 'mcp server not found', data: null }))
      });

      await expect(client.getMcpServer('weather')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        resourceName: 'weather',
        message: 'mcp server not found'
      });
    });

    it('should map other codes to RegistryError with the registry code', async () => {
      const client = new NacosRegistryClient({
        fetch: makeFetch(json({ code: 30000, message: 'server error', data: null }, 500))
      });

      const error = await client.getMcpServer('weather').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RegistryError);
      expect(error).toMatchObject({ message: 'server error', status: 30000 });
    });

    it('should reject malformed details', async () => {
      const client = new NacosRegistryClient({ fetch: makeFetch(ok({ name: 'weather' })) });

      await expect(client.getMcpServer('weather')).rejects.toThrow(
        "Malformed mcp-server 'weather' returned by registry"
      );
    });

    it('should map network failures to RegistryUnreachableError', async () => {
      const cause = new TypeError('fetch failed');
      const client = new NacosRegistryClient({ fetch: makeFetch(cause) });

      const error = await client.getMcpServer('weather').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RegistryUnreachableError);
      expect(error).toMatchObject({
        message: 'Registry http://127.0.0.1:8848 is unreachable',
        cause
      });
    });

    it('should map aborted requests to TimeoutError', async () => {
      const abort = new Error('The operation was aborted due to timeout');
      abort.name = 'TimeoutError';
      const client = new NacosRegistryClient({
        fetch: makeFetch(abort),
        connection: { requestTimeoutMs: 1500 }
      });

      await expect(client.getMcpServer('weather')).rejects.toMatchObject({
        timeoutMs: 1500,
        message: 'Registry request to /nacos/v3/admin/ai/mcp timed out after 1500ms'
      });
      await expect(
        new NacosRegistryClient({ fetch: makeFetch(abort) }).getMcpServer('weather')
      ).rejects.toBeInstanceOf(TimeoutError);
    });
  });

  describe('authentication', () => {
    it('should log in once and send the token', async () => {
      const fetchMock = makeFetch(
        json({ accessToken: 'test-token', tokenTtl: 18000 }),
        ok({ name: 'weather', protocol: 'mcp-sse' }),
        ok({ name: 'writer', url: 'http://10.0.0.7:9000' })
      );
      const client = new NacosRegistryClient({
        fetch: fetchMock,
        connection: { username: 'nacos', password: 'test-secret' }
      });

      await client.getMcpServer('weather');
      await client.getAgentCard('writer');

      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(requestUrl(fetchMock, 0)).toBe('http://127.0.0.1:8848/nacos/v3/auth/user/login');
      expect(requestInit(fetchMock, 0).body).toBe('username=nacos&password=test-secret');
      expect(requestInit(fetchMock, 1).headers).toEqual({ accessToken: 'test-token' });
      expect(requestInit(fetchMock, 2).headers).toEqual({ accessToken: 'test-token' });
    });

    it('should log in again once the token is near expiry', async () => {
      let now = 0;
      const fetchMock = makeFetch(
        json({ accessToken: 'first', tokenTtl: 10 }),
        ok({ name: 'weather', protocol: 'mcp-sse' }),
        json({ accessToken: 'second', tokenTtl: 10 }),
        ok({ name: 'weather', protocol: 'mcp-sse' })
      );
      const client = new NacosRegistryClient({
        fetch: fetchMock,
        now: () => now,
        connection: { username: 'nacos', password: 'test-secret' }
      });

      await client.getMcpServer('weather');
      now = 9000;
      await client.getMcpServer('weather');

      expect(requestInit(fetchMock, 3).headers).toEqual({ accessToken: 'second' });
    });

    it('should use a static token without logging in', async () => {
      const fetchMock = makeFetch(ok({ name: 'weather', protocol: 'mcp-sse' }));
      const client = new NacosRegistryClient({
        fetch: fetchMock,
        connection: { accessToken: 'static-token', username: 'nacos', password: 'test-secret' }
      });

      await client.getMcpServer('weather');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(requestInit(fetchMock).headers).toEqual({ accessToken: 'static-token' });
    });

    it('should fail with RegistryError when login is refused', async () => {
      const client = new NacosRegistryClient({
        fetch: makeFetch(json({ message: 'bad credentials' }, 403)),
        connection: { username: 'nacos', password: 'wrong' }
      });

      await expect(client.getMcpServer('weather')).rejects.toThrow(
        'Registry login failed with HTTP 403'
      );
    });
  });

  describe('agent cards', () => {
    it('should release a card as a form post', async () => {
      const fetchMock = makeFetch(ok(true));
      const client = new NacosRegistryClient({ fetch: fetchMock });
      const card = registryAgentCard();

      await client.releaseAgentCard(card, { setAsLatest: true });

      const init = requestInit(fetchMock);
      expect(requestUrl(fetchMock)).toBe('http://127.0.0.1:8848/nacos/v3/admin/ai/a2a');
      expect(init.method).toBe('POST');
      const body = new URLSearchParams(String(init.body));
      expect(body.get('namespaceId')).toBe('public');
      expect(body.get('agentName')).toBe('writer');
      expect(body.get('version')).toBe('1.0.0');
      expect(body.get('registrationType')).toBe('SERVICE');
      expect(body.get('setAsLatest')).toBe('true');
      expect(JSON.parse(body.get('agentCard') ?? '')).toEqual(card);
    });

    it('should register endpoints', async () => {
      const fetchMock = makeFetch(ok(true));
      const client = new NacosRegistryClient({ fetch: fetchMock });
      const endpoints = [{ transport: 'JSONRPC', address: '10.0.0.7', port: 9000, version: '1.0.0' }];

      await client.registerAgentEndpoints('writer', endpoints);

      const body = new URLSearchParams(String(requestInit(fetchMock).body));
      expect(requestUrl(fetchMock)).toBe('http://127.0.0.1:8848/nacos/v3/admin/ai/a2a/endpoint');
      expect(body.get('agentName')).toBe('writer');
      expect(JSON.parse(body.get('endpoints') ?? '')).toEqual(endpoints);
    });
  });

  describe('subscriptions', () => {
    it('should serve subscribe from the HTTP API and stop on close', async () => {
      const fetchMock = makeFetch(ok({ name: 'weather', protocol: 'mcp-sse' }));
      const client = new NacosRegistryClient({ fetch: fetchMock });

      await expect(client.mcpServers.subscribe('weather', vi.fn())).resolves.toMatchObject({
        name: 'weather'
      });
      expect(client.mcpServers.watching()).toEqual(['weather']);

      await client.close();
      expect(client.mcpServers.watching()).toEqual([]);
    });
  });
});
