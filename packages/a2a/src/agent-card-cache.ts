/**
 * Registry-backed cache of A2A agent cards
 */

import type { AgentCard } from '@a2a-js/sdk';
import {
  createSilentLogger,
  InvalidParamError,
  type Logger,
  type RefreshError,
  type RegistryAgentCard
} from '@registry-bridge/core';
import {
  type Dependent,
  type DescriptorSource,
  mapSource,
  type RegistryClient,
  ResourceCache
} from '@registry-bridge/registry';
import { toA2aCard } from './card-converter.js';
import type { AgentCardResolver } from './card-resolver.js';

export type AgentCardCacheOptions = {
  fetchTimeoutMs?: number;
  logger?: Logger;
};

export type CardRefreshFailedHandler = (event: { name: string; error: RefreshError }) => void;

export class AgentCardCache {
  private readonly cache: ResourceCache<AgentCard>;
  private readonly logger: Logger;

  constructor(source: DescriptorSource<RegistryAgentCard>, options: AgentCardCacheOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.cache = new ResourceCache({
      source: mapSource(source, toA2aCard, this.logger),
      kind: 'agent-card',
      fetchTimeoutMs: options.fetchTimeoutMs,
      logger: this.logger
    });
  }

  static from(
    client: Pick<RegistryClient, 'agentCards'>,
    options: AgentCardCacheOptions = {}
  ): AgentCardCache {
    return new AgentCardCache(client.agentCards, options);
  }

  getAgentCard(name: string): Promise<AgentCard> {
    return this.cache.get(name);
  }

  /**
   * Resolver that always answers with the latest card of `name`
   */
  forAgent(name: string): AgentCardResolver {
    return new RegistryAgentCardResolver(name, this);
  }

  subscribe(name: string, dependent: Dependent<AgentCard>): void {
    if (this.cache.addDependent(name, dependent)) {
      this.logger.debug(`Subscribed to agent card ${name}`);
    }
  }

  unsubscribe(name: string, dependent: Dependent<AgentCard>): void {
    this.cache.removeDependent(name, dependent);
  }

  subscriberCount(name: string): number {
    return this.cache.dependentCount(name);
  }

  onRefreshFailed(handler: CardRefreshFailedHandler): () => void {
    this.cache.on('refresh:failed', handler);
    return () => this.cache.off('refresh:failed', handler);
  }

  drain(): Promise<void> {
    return this.cache.drain();
  }

  get isClosed(): boolean {
    return this.cache.isClosed;
  }

  close(): Promise<void> {
    return this.cache.close();
  }
}

export class RegistryAgentCardResolver implements AgentCardResolver {
  readonly agentName: string;
  private readonly cards: Pick<AgentCardCache, 'getAgentCard'>;

  constructor(agentName: string, cards: Pick<AgentCardCache, 'getAgentCard'>) {
    if (!agentName.trim()) {
      throw new InvalidParamError('Agent name must not be blank');
    }
    this.agentName = agentName;
    this.cards = cards;
  }

  getAgentCard(): Promise<AgentCard> {
    return this.cards.getAgentCard(this.agentName);
  }
}
