import type { AgentCard } from '@a2a-js/sdk';
import {
  type A2aConfig,
  createMutex,
  InvalidParamError,
  type Logger
} from '@registry-bridge/core';
import type { RegistryClient } from '@registry-bridge/registry';
import { A2aAgent, type A2aClientFactory } from './a2a-agent.js';
import { type AgentCardCache, RegistryAgentCardResolver } from './agent-card-cache.js';
import { toA2aCard } from './card-converter.js';
import type { AgentCardResolver } from './card-resolver.js';

/**
 * Card of one published version, fetched on first use and kept.
 * A pinned version does not follow registry pushes.
 */
export class VersionedAgentCardResolver implements AgentCardResolver {
  readonly agentName: string;
  readonly version: string;
  private readonly registry: Pick<RegistryClient, 'getAgentCard'>;
  private readonly mutex = createMutex();
  private card: AgentCard | undefined;

  constructor(
    agentName: string,
    version: string,
    registry: Pick<RegistryClient, 'getAgentCard'>
  ) {
    if (!agentName.trim()) {
      throw new InvalidParamError('Agent name must not be blank');
    }
    if (!version.trim()) {
      throw new InvalidParamError(`Version of agent ${agentName} must not be blank`);
    }
    this.agentName = agentName;
    this.version = version;
    this.registry = registry;
  }

  async getAgentCard(): Promise<AgentCard> {
    return this.mutex.runExclusive(async () => {
      if (!this.card) {
        this.card = toA2aCard(await this.registry.getAgentCard(this.agentName, this.version));
      }
      return this.card;
    });
  }
}

export type ConfiguredAgentsOptions = {
  createClient?: A2aClientFactory;
  logger?: Logger;
};

/**
 * One agent per configured name. Agents without a version follow the latest
 * card through `cards`; pinned ones read their version once from `registry`.
 */
export function createConfiguredA2aAgents(
  agents: A2aConfig['agents'],
  cards: Pick<AgentCardCache, 'getAgentCard'>,
  registry: Pick<RegistryClient, 'getAgentCard'>,
  options: ConfiguredAgentsOptions = {}
): Map<string, A2aAgent> {
  const created = new Map<string, A2aAgent>();
  for (const [name, remote] of Object.entries(agents)) {
    const resolver =
      remote.version === undefined
        ? new RegistryAgentCardResolver(name, cards)
        : new VersionedAgentCardResolver(name, remote.version, registry);
    created.set(
      name,
      new A2aAgent(resolver, {
        name,
        createClient: options.createClient,
        logger: options.logger?.child(name)
      })
    );
  }
  return created;
}
