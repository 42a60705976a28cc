import type {
  AgentEndpoint,
  McpServerDetail,
  RegistryAgentCard
} from '@registry-bridge/core';

/**
 * Push callback: the registry's view of `name` changed to `descriptor`
 */
export type DescriptorListener<D> = (name: string, descriptor: D) => void;

/**
 * Subscribe-and-fetch contract of a registry resource type
 *
 * `subscribe` resolves with the current descriptor and keeps calling the
 * listener with later versions until `unsubscribe`.
 */
export type DescriptorSource<D> = {
  subscribe(name: string, listener: DescriptorListener<D>): Promise<D>;
  unsubscribe(name: string, listener: DescriptorListener<D>): Promise<void>;
};

/**
 * Consumer bound to one named resource
 */
export type Dependent<D> = {
  refresh(descriptor: D): Promise<void>;
};

export type ReleaseAgentCardOptions = {
  setAsLatest: boolean;
};

export type RegistryClient = {
  readonly mcpServers: DescriptorSource<McpServerDetail>;
  readonly agentCards: DescriptorSource<RegistryAgentCard>;
  getAgentCard(name: string, version?: string): Promise<RegistryAgentCard>;
  releaseAgentCard(card: RegistryAgentCard, options: ReleaseAgentCardOptions): Promise<void>;
  registerAgentEndpoints(agentName: string, endpoints: AgentEndpoint[]): Promise<void>;
  close(): Promise<void>;
};
