/**
 * Sources of the agent card a remote A2A agent is called through
 */

import type { Stats } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { AGENT_CARD_PATH, type AgentCard } from '@a2a-js/sdk';
import {
  ConfigError,
  createSilentLogger,
  type Logger,
  TimeoutError,
  toErrorMessage,
  TransportError
} from '@registry-bridge/core';
import type { FetchLike } from '@registry-bridge/registry';
import { parseAgentCard } from './card-converter.js';

export const DEFAULT_CARD_TIMEOUT_MS = 10000;

export type AgentCardResolver = {
  getAgentCard(): Promise<AgentCard>;
};

export class FixedAgentCardResolver implements AgentCardResolver {
  private readonly card: AgentCard;

  constructor(card: AgentCard) {
    this.card = card;
  }

  async getAgentCard(): Promise<AgentCard> {
    return this.card;
  }
}

export type FileAgentCardResolverOptions = {
  cwd?: string;
  logger?: Logger;
};

/**
 * Reads the card from a JSON file on every call
 */
export class FileAgentCardResolver implements AgentCardResolver {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, options: FileAgentCardResolverOptions = {}) {
    this.filePath = isAbsolute(filePath) ? filePath : resolve(options.cwd ?? process.cwd(), filePath);
    this.logger = options.logger ?? createSilentLogger();
  }

  async getAgentCard(): Promise<AgentCard> {
    let info: Stats;
    try {
      info = await stat(this.filePath);
    } catch (error) {
      throw new ConfigError(`Agent card file not found: ${this.filePath}`, { cause: error });
    }
    if (!info.isFile()) {
      throw new ConfigError(`Path is not a file: ${this.filePath}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(await readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Invalid JSON in agent card file ${this.filePath}: ${toErrorMessage(error)}`, {
        cause: error
      });
    }

    const parsed = parseAgentCard(data);
    if (!parsed.success) {
      throw new ConfigError(`Invalid agent card in ${this.filePath}: ${parsed.error}`);
    }
    this.logger.debug(`Loaded agent card ${parsed.card.name} from ${this.filePath}`);
    return parsed.card;
  }
}

export type WellKnownAgentCardResolverOptions = {
  /** Card path relative to the base URL, the A2A well-known path by default */
  cardPath?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetch?: FetchLike;
  logger?: Logger;
};

/**
 * Fetches the card an agent publishes under its base URL
 */
export class WellKnownAgentCardResolver implements AgentCardResolver {
  readonly cardUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(baseUrl: string, options: WellKnownAgentCardResolverOptions = {}) {
    const parsed = URL.canParse(baseUrl) ? new URL(baseUrl) : undefined;
    if (!parsed || !parsed.host || !['http:', 'https:'].includes(parsed.protocol)) {
      throw new ConfigError(`Invalid URL format: ${baseUrl}`);
    }

    const cardPath = options.cardPath ?? AGENT_CARD_PATH;
    this.cardUrl = `${baseUrl.replace(/\/+$/, '')}/${cardPath.replace(/^\/+/, '')}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CARD_TIMEOUT_MS;
    this.headers = { ...options.headers };
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createSilentLogger();
  }

  async getAgentCard(): Promise<AgentCard> {
    this.logger.debug(`Fetching agent card from ${this.cardUrl}`);

    let response: Response;
    try {
      response = await this.fetchImpl(this.cardUrl, {
        headers: { Accept: 'application/json', ...this.headers },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TimeoutError(
          `Agent card request to ${this.cardUrl} timed out after ${this.timeoutMs}ms`,
          this.timeoutMs,
          { cause: error }
        );
      }
      throw this.failure(toErrorMessage(error), error);
    }

    if (!response.ok) {
      throw this.failure(`HTTP ${response.status}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw this.failure('response is not JSON', error);
    }

    const parsed = parseAgentCard(data);
    if (!parsed.success) {
      throw this.failure(parsed.error);
    }
    return parsed.card;
  }

  private failure(reason: string, cause?: unknown): TransportError {
    return new TransportError(`Failed to resolve agent card from ${this.cardUrl}: ${reason}`, { cause });
  }
}
