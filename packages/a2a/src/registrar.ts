/**
 * Publishes a locally served agent to the registry
 */

import type { AgentCard } from '@a2a-js/sdk';
import {
  type AgentEndpoint,
  type AgentRegistrationInput,
  createSilentLogger,
  ErrorCode,
  errorData,
  hasErrorCode,
  type Logger,
  type RegistryAgentCard
} from '@registry-bridge/core';
import type { RegistryClient } from '@registry-bridge/registry';
import { toRegistryCard } from './card-converter.js';
import {
  buildRegistrationPlan,
  type BuildRegistrationPlanOptions,
  type DeployInfo,
  type TransportEndpoint
} from './registration.js';

export type AgentRegistrationTarget = Pick<
  RegistryClient,
  'getAgentCard' | 'releaseAgentCard' | 'registerAgentEndpoints'
>;

export type AgentRegistration = {
  endpoints: TransportEndpoint[];
  registerAsLatest?: boolean;
  enabledRegisterEndpoint?: boolean;
};

export type AgentRegistrarOptions = {
  logger?: Logger;
};

export class AgentRegistrar {
  private readonly registry: AgentRegistrationTarget;
  private readonly logger: Logger;

  constructor(registry: AgentRegistrationTarget, options: AgentRegistrarOptions = {}) {
    this.registry = registry;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Release `card` and register the endpoints it is reachable at
   */
  async registerAgent(card: AgentCard, registration: AgentRegistration): Promise<void> {
    const registryCard = toRegistryCard(card);
    try {
      await this.releaseCard(registryCard, registration.registerAsLatest ?? true);
      await this.registerEndpoints(registryCard, registration);
    } catch (error) {
      this.logger.error(`Register agent card ${card.name} to registry failed`, errorData(error));
      throw error;
    }
  }

  /**
   * Build the registration plan of an agent served at `deploy` and apply it
   *
   * Resolves with the card as published, which differs from `card` when the
   * preferred transport was overwritten.
   */
  async register(
    card: AgentCard,
    properties: AgentRegistrationInput,
    deploy: DeployInfo,
    options: Omit<BuildRegistrationPlanOptions, 'logger'> = {}
  ): Promise<AgentCard> {
    const plan = buildRegistrationPlan(card, properties, deploy, { ...options, logger: this.logger });
    await this.registerAgent(plan.card, plan);
    return plan.card;
  }

  private async releaseCard(card: RegistryAgentCard, setAsLatest: boolean): Promise<void> {
    if (await this.exists(card)) {
      this.logger.warn(`Agent card ${card.name} already exists, agentCard release might be ignored.`);
    }
    this.logger.info(`Register agent card ${card.name} to registry`);
    await this.registry.releaseAgentCard(card, { setAsLatest });
    this.logger.info(`Register agent card ${card.name} to registry successfully`);
  }

  private async exists(card: RegistryAgentCard): Promise<boolean> {
    try {
      await this.registry.getAgentCard(card.name, card.version);
      return true;
    } catch (error) {
      if (hasErrorCode(error, ErrorCode.NOT_FOUND)) return false;
      throw error;
    }
  }

  private async registerEndpoints(card: RegistryAgentCard, registration: AgentRegistration): Promise<void> {
    if (registration.enabledRegisterEndpoint === false) {
      this.logger.info('Disabled register endpoint(s) to Agent, skip endpoint(s) register step.');
      return;
    }
    if (registration.endpoints.length === 0) {
      this.logger.warn('No endpoint(s) found, skip endpoint(s) register step.');
      return;
    }

    this.logger.info(`Register ${registration.endpoints.length} endpoint(s) of ${card.name}`);
    await this.registry.registerAgentEndpoints(
      card.name,
      registration.endpoints.map((endpoint) => toAgentEndpoint(endpoint, card.version))
    );
  }
}

function toAgentEndpoint(endpoint: TransportEndpoint, version: string): AgentEndpoint {
  return {
    transport: endpoint.transport,
    address: endpoint.address,
    port: endpoint.port,
    path: endpoint.path,
    protocol: endpoint.protocol,
    query: endpoint.query,
    supportTls: endpoint.supportTls,
    version
  };
}
