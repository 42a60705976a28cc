import type { AgentCard, Message } from '@a2a-js/sdk';
import { createTextMsg, getTextContent, InvalidParamError } from '@registry-bridge/core';
import { InMemoryRegistryClient, registryAgentCard } from '@registry-bridge/test-utils';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { A2aClientLike } from './a2a-agent.js';
import { toA2aCard } from './card-converter.js';
import { createConfiguredA2aAgents, VersionedAgentCardResolver } from './configured-agents.js';

const reply = (text: string): Message => ({
  kind: 'message',
  messageId: 'reply-1',
  role: 'agent',
  parts: [{ kind: 'text', text }]
});

const echoClient = (card: AgentCard): A2aClientLike => ({
  async *sendMessageStream() {
    yield reply(`${card.name} ${card.version}`);
  },
  cancelTask: vi.fn()
});

describe('VersionedAgentCardResolver', () => {
  let registry: InMemoryRegistryClient;

  beforeEach(() => {
    registry = new InMemoryRegistryClient();
    registry.agentCards.seed('writer', registryAgentCard());
  });

  it('should fetch the pinned version once', async () => {
    const getAgentCard = vi.spyOn(registry, 'getAgentCard');
    const resolver = new VersionedAgentCardResolver('writer', '1.0.0', registry);

    await expect(resolver.getAgentCard()).resolves.toEqual(toA2aCard(registryAgentCard()));
    await resolver.getAgentCard();

    expect(getAgentCard).toHaveBeenCalledTimes(1);
    expect(getAgentCard).toHaveBeenCalledWith('writer', '1.0.0');
  });

  it('should surface a missing version', async () => {
    const resolver = new VersionedAgentCardResolver('writer', '2.0.0', registry);

    await expect(resolver.getAgentCard()).rejects.toMatchObject({
      code: 'NOT_FOUND',
      resourceName: 'writer'
    });
  });

  it('should reject blank names and versions', () => {
    expect(() => new VersionedAgentCardResolver('', '1.0.0', registry)).toThrow(
      new InvalidParamError('Agent name must not be blank')
    );
    expect(() => new VersionedAgentCardResolver('writer', ' ', registry)).toThrow(
      new InvalidParamError('Version of agent writer must not be blank')
    );
  });
});

describe('createConfiguredA2aAgents', () => {
  it('should follow the latest card unless a version is pinned', async () => {
    const cards = {
      getAgentCard: vi.fn(async (name: string) =>
        toA2aCard(registryAgentCard({ name, version: '2.0.0' }))
      )
    };
    const registry = {
      getAgentCard: vi.fn(async (name: string, version?: string) =>
        registryAgentCard({ name, version })
      )
    };

    const agents = createConfiguredA2aAgents(
      { writer: {}, reviewer: { version: '1.0.0' } },
      cards,
      registry,
      { createClient: echoClient }
    );

    expect([...agents.keys()]).toEqual(['writer', 'reviewer']);
    const writer = agents.get('writer');
    const reviewer = agents.get('reviewer');
    if (!writer || !reviewer) throw new Error('configured agents missing');

    expect(writer.name).toBe('writer');
    expect(getTextContent(await writer.call(createTextMsg('user', 'Hi')))).toBe('writer 2.0.0');
    expect(getTextContent(await reviewer.call(createTextMsg('user', 'Hi')))).toBe(
      'reviewer 1.0.0'
    );
    expect(cards.getAgentCard).toHaveBeenCalledWith('writer');
    expect(cards.getAgentCard).not.toHaveBeenCalledWith('reviewer');
    expect(registry.getAgentCard).toHaveBeenCalledWith('reviewer', '1.0.0');
  });
});
