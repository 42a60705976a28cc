/**
 * Conversion between registry agent cards and A2A agent cards
 */

import type { AgentCard } from '@a2a-js/sdk';
import {
  formatConfigError,
  type RegistryAgentCard,
  RegistryAgentCardSchema
} from '@registry-bridge/core';

export const DEFAULT_PROTOCOL_VERSION = '0.3.0';
export const DEFAULT_PREFERRED_TRANSPORT = 'JSONRPC';

/**
 * A2A card from a registry card
 *
 * `securitySchemes` is not carried over: the registry stores it untyped.
 */
export function toA2aCard(card: RegistryAgentCard): AgentCard {
  const converted: AgentCard = {
    name: card.name,
    description: card.description,
    version: card.version,
    url: card.url ?? '',
    protocolVersion: card.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
    preferredTransport: card.preferredTransport ?? DEFAULT_PREFERRED_TRANSPORT,
    additionalInterfaces: (card.additionalInterfaces ?? []).map((item) => ({ ...item })),
    capabilities: { ...card.capabilities },
    skills: (card.skills ?? []).map((skill) => ({ ...skill, tags: [...skill.tags] })),
    defaultInputModes: [...(card.defaultInputModes ?? [])],
    defaultOutputModes: [...(card.defaultOutputModes ?? [])]
  };

  if (card.provider) converted.provider = { ...card.provider };
  if (card.iconUrl !== undefined) converted.iconUrl = card.iconUrl;
  if (card.documentationUrl !== undefined) converted.documentationUrl = card.documentationUrl;
  if (card.supportsAuthenticatedExtendedCard !== undefined) {
    converted.supportsAuthenticatedExtendedCard = card.supportsAuthenticatedExtendedCard;
  }
  if (card.security) converted.security = card.security.map((requirement) => ({ ...requirement }));
  return converted;
}

export function toRegistryCard(card: AgentCard): RegistryAgentCard {
  return {
    name: card.name,
    description: card.description,
    version: card.version,
    url: card.url,
    protocolVersion: card.protocolVersion,
    preferredTransport: card.preferredTransport,
    additionalInterfaces: card.additionalInterfaces?.map(({ url, transport }) => ({ url, transport })),
    capabilities: {
      streaming: card.capabilities.streaming,
      pushNotifications: card.capabilities.pushNotifications,
      stateTransitionHistory: card.capabilities.stateTransitionHistory
    },
    skills: card.skills.map((skill) => ({
      id: skill.id,
      name: skill.name,
      description: skill.description,
      tags: [...skill.tags],
      examples: skill.examples,
      inputModes: skill.inputModes,
      outputModes: skill.outputModes
    })),
    defaultInputModes: [...card.defaultInputModes],
    defaultOutputModes: [...card.defaultOutputModes],
    provider: card.provider,
    iconUrl: card.iconUrl,
    documentationUrl: card.documentationUrl,
    supportsAuthenticatedExtendedCard: card.supportsAuthenticatedExtendedCard,
    securitySchemes: card.securitySchemes ? { ...card.securitySchemes } : undefined,
    security: card.security?.map((requirement) => ({ ...requirement }))
  };
}

export type ParsedAgentCard = { success: true; card: AgentCard } | { success: false; error: string };

/**
 * Validate a JSON agent card document
 */
export function parseAgentCard(data: unknown): ParsedAgentCard {
  const result = RegistryAgentCardSchema.safeParse(data);
  if (!result.success) {
    return { success: false, error: formatConfigError(result.error) };
  }
  return { success: true, card: toA2aCard(result.data) };
}
