import { registryAgentCard } from '@registry-bridge/test-utils';
import { describe, expect, it } from 'vitest';
import { parseAgentCard, toA2aCard, toRegistryCard } from './card-converter.js';

describe('toA2aCard', () => {
  it('should fill A2A defaults for fields the registry left out', () => {
    expect(toA2aCard({ name: 'writer', description: '', version: '1.0.0' })).toEqual({
      name: 'writer',
      description: '',
      version: '1.0.0',
      url: '',
      protocolVersion: '0.3.0',
      preferredTransport: 'JSONRPC',
      additionalInterfaces: [],
      capabilities: {},
      skills: [],
      defaultInputModes: [],
      defaultOutputModes: []
    });
  });

  it('should copy the card without sharing nested objects', () => {
    const card = registryAgentCard({
      provider: { organization: 'Example Org', url: 'https://example.test' },
      iconUrl: 'https://example.test/icon.png',
      security: [{ apiKey: [] }],
      securitySchemes: { apiKey: { type: 'apiKey', in: 'header', name: 'X-Api-Key' } }
    });

    const converted = toA2aCard(card);

    expect(converted).toMatchObject({
      name: 'writer',
      url: 'http://10.0.0.7:9000/a2a/',
      preferredTransport: 'JSONRPC',
      capabilities: { streaming: true },
      skills: [{ id: 'write', name: 'write', description: 'Write text', tags: ['text'] }],
      provider: { organization: 'Example Org', url: 'https://example.test' },
      iconUrl: 'https://example.test/icon.png',
      security: [{ apiKey: [] }]
    });
    expect(converted.securitySchemes).toBeUndefined();
    expect(converted.skills[0]).not.toBe(card.skills?.[0]);
    expect(converted.capabilities).not.toBe(card.capabilities);
  });

  it('should derive equal cards from the same registry card', () => {
    const card = registryAgentCard();

    const first = toA2aCard(card);
    const second = toA2aCard(card);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(second.skills).not.toBe(first.skills);
  });
});

describe('toRegistryCard', () => {
  it('should restore the registry card of a converted one', () => {
    const card = registryAgentCard();

    expect(toRegistryCard(toA2aCard(card))).toEqual({ ...card, additionalInterfaces: [] });
  });
});

describe('parseAgentCard', () => {
  it('should accept card documents', () => {
    const parsed = parseAgentCard({ name: 'writer', url: 'http://10.0.0.7:9000/a2a/' });

    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.card.description).toBe('');
      expect(parsed.card.version).toBe('1.0.0');
    }
  });

  it('should report invalid documents', () => {
    expect(parseAgentCard({ description: 'no name' })).toEqual({
      success: false,
      error: 'Configuration validation failed:\nname: Required'
    });
  });
});
