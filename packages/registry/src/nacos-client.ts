/**
 * Registry client for the Nacos AI registry over its HTTP API
 */

import {
  type AgentEndpoint,
  createSilentLogger,
  type Logger,
  type McpServerDetail,
  McpServerDetailSchema,
  type RegistryAgentCard,
  RegistryAgentCardSchema,
  RegistryError,
  type RegistryConnection,
  type RegistryConnectionInput,
  RegistryUnreachableError,
  ResourceNotFoundError,
  type ResourceKind,
  resolveRegistryConnection,
  TimeoutError
} from '@registry-bridge/core';
import { z } from 'zod';
import { PollingSource } from './polling-source.js';
import type { ReleaseAgentCardOptions, RegistryClient } from './types.js';

export const NACOS_API = {
  login: '/v3/auth/user/login',
  mcpServer: '/v3/admin/ai/mcp',
  agentCard: '/v3/admin/ai/a2a',
  agentEndpoint: '/v3/admin/ai/a2a/endpoint'
} as const;

/** Registry code for a missing resource */
export const NACOS_NOT_FOUND_CODE = 20004;

/** Registration type sent with released agent cards */
export const AGENT_REGISTRATION_TYPE = 'SERVICE';

const EnvelopeSchema = z.object({
  code: z.number(),
  message: z.string().nullish(),
  data: z.unknown()
});

const LoginResponseSchema = z.object({
  accessToken: z.string(),
  tokenTtl: z.number().optional()
});

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type NacosRegistryClientOptions = {
  connection?: RegistryConnectionInput;
  fetch?: FetchLike;
  logger?: Logger;
  now?: () => number;
};

type RequestOptions = {
  method?: 'GET' | 'POST';
  query?: Record<string, string | undefined>;
  form?: Record<string, string | undefined>;
  resource?: { kind: ResourceKind; name: string };
};

type CachedToken = {
  value: string;
  expiresAt: number;
};

const DEFAULT_TOKEN_TTL_SECONDS = 18000;

export class NacosRegistryClient implements RegistryClient {
  readonly connection: RegistryConnection;
  readonly mcpServers: PollingSource<McpServerDetail>;
  readonly agentCards: PollingSource<RegistryAgentCard>;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly now: () => number;
  private token: CachedToken | undefined;
  private login: Promise<CachedToken> | undefined;

  constructor(options: NacosRegistryClientOptions = {}) {
    this.connection = resolveRegistryConnection(options.connection ?? {});
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;

    this.mcpServers = new PollingSource({
      fetch: (name) => this.getMcpServer(name),
      intervalMs: this.connection.pollIntervalMs,
      logger: this.logger.child('mcp-poll')
    });
    this.agentCards = new PollingSource({
      fetch: (name) => this.getAgentCard(name),
      intervalMs: this.connection.pollIntervalMs,
      logger: this.logger.child('a2a-poll')
    });
  }

  async getMcpServer(name: string, version?: string): Promise<McpServerDetail> {
    const data = await this.request(NACOS_API.mcpServer, {
      query: { mcpName: name, version },
      resource: { kind: 'mcp-server', name }
    });
    return this.parse(McpServerDetailSchema, data, `mcp-server '${name}'`);
  }

  async getAgentCard(name: string, version?: string): Promise<RegistryAgentCard> {
    const data = await this.request(NACOS_API.agentCard, {
      query: { agentName: name, version },
      resource: { kind: 'agent-card', name }
    });
    return this.parse(RegistryAgentCardSchema, data, `agent-card '${name}'`);
  }

  async releaseAgentCard(
    card: RegistryAgentCard,
    options: ReleaseAgentCardOptions
  ): Promise<void> {
    await this.request(NACOS_API.agentCard, {
      method: 'POST',
      form: {
        agentName: card.name,
        version: card.version,
        agentCard: JSON.stringify(card),
        registrationType: AGENT_REGISTRATION_TYPE,
        setAsLatest: String(options.setAsLatest)
      }
    });
    this.logger.debug(`Released agent card ${card.name}@${card.version}`);
  }

  async registerAgentEndpoints(agentName: string, endpoints: AgentEndpoint[]): Promise<void> {
    await this.request(NACOS_API.agentEndpoint, {
      method: 'POST',
      form: {
        agentName,
        endpoints: JSON.stringify(endpoints)
      }
    });
    this.logger.debug(`Registered ${endpoints.length} endpoint(s) for ${agentName}`);
  }

  async close(): Promise<void> {
    this.mcpServers.close();
    this.agentCards.close();
    this.token = undefined;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new RegistryError(`Malformed ${what} returned by registry`, { cause: result.error });
    }
    return result.data;
  }

  private url(path: string): URL {
    const base = this.connection.serverAddr.replace(/\/+$/, '');
    const contextPath = this.connection.contextPath.replace(/\/+$/, '');
    return new URL(`${base}${contextPath}${path}`);
  }

  private async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const method = options.method ?? 'GET';
    const url = this.url(path);
    const params = new URLSearchParams();
    const target = method === 'GET' ? url.searchParams : params;

    target.set('namespaceId', this.connection.namespaceId);
    for (const [key, value] of Object.entries({ ...options.query, ...options.form })) {
      if (value !== undefined) target.set(key, value);
    }

    const headers: Record<string, string> = {};
    const token = await this.accessToken();
    if (token) headers.accessToken = token;
    if (method === 'POST') headers['Content-Type'] = 'application/x-www-form-urlencoded';

    const response = await this.send(url, {
      method,
      headers,
      body: method === 'POST' ? params.toString() : undefined
    });

    if (response.status === 404 && options.resource) {
      throw new ResourceNotFoundError(options.resource.kind, options.resource.name);
    }

    const body = await this.readJson(response);
    const envelope = EnvelopeSchema.safeParse(body);

    if (!envelope.success) {
      throw new RegistryError(`Registry answered ${method} ${path} with HTTP ${response.status}`, {
        status: response.status
      });
    }

    const { code, message, data } = envelope.data;
    if (code === NACOS_NOT_FOUND_CODE && options.resource) {
      throw new ResourceNotFoundError(options.resource.kind, options.resource.name, {
        message: message ?? undefined
      });
    }
    if (code !== 0 || !response.ok) {
      throw new RegistryError(message ?? `Registry request ${method} ${path} failed`, {
        status: code
      });
    }
    return data;
  }

  private async send(url: URL, init: RequestInit): Promise<Response> {
    const timeoutMs = this.connection.requestTimeoutMs;
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TimeoutError(`Registry request to ${url.pathname} timed out after ${timeoutMs}ms`, timeoutMs, {
          cause: error
        });
      }
      throw new RegistryUnreachableError(`Registry ${this.connection.serverAddr} is unreachable`, {
        cause: error
      });
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new RegistryError(`Registry returned a non-JSON body with HTTP ${response.status}`, {
        status: response.status,
        cause: error
      });
    }
  }

  private async accessToken(): Promise<string | undefined> {
    const { accessToken, username, password } = this.connection;
    if (accessToken) return accessToken;
    if (!username || password === undefined) return undefined;

    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value;
    }
    if (!this.login) {
      this.login = this.authenticate(username, password).finally(() => {
        this.login = undefined;
      });
    }
    this.token = await this.login;
    return this.token.value;
  }

  private async authenticate(username: string, password: string): Promise<CachedToken> {
    const url = this.url(NACOS_API.login);
    const response = await this.send(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ username, password }).toString()
    });
    if (!response.ok) {
      throw new RegistryError(`Registry login failed with HTTP ${response.status}`, {
        status: response.status
      });
    }

    const parsed = LoginResponseSchema.safeParse(await this.readJson(response));
    if (!parsed.success) {
      throw new RegistryError('Registry login returned no access token', { cause: parsed.error });
    }

    const ttlSeconds = parsed.data.tokenTtl ?? DEFAULT_TOKEN_TTL_SECONDS;
    this.logger.debug('Logged in to registry', { ttlSeconds });
    // Renew once 90% of the lifetime has passed
    return { value: parsed.data.accessToken, expiresAt: this.now() + ttlSeconds * 900 };
  }
}
