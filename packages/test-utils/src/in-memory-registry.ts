import {
  type AgentEndpoint,
  type McpServerDetail,
  type RegistryAgentCard,
  ResourceNotFoundError,
  type ResourceKind
} from '@registry-bridge/core';
import type {
  DescriptorListener,
  DescriptorSource,
  RegistryClient,
  ReleaseAgentCardOptions
} from '@registry-bridge/registry';

/**
 * In-process stand-in for one registry resource type
 *
 * `put` behaves like an edit in the registry: stored, then pushed to every
 * subscriber of that name.
 */
export class InMemoryDescriptorSource<D> implements DescriptorSource<D> {
  subscribeCalls = 0;
  unsubscribeCalls = 0;
  private readonly kind: ResourceKind;
  private readonly descriptors = new Map<string, D>();
  private readonly listeners = new Map<string, Set<DescriptorListener<D>>>();
  private readonly failures: unknown[] = [];
  private gate: Promise<void> | undefined;

  constructor(kind: ResourceKind) {
    this.kind = kind;
  }

  async subscribe(name: string, listener: DescriptorListener<D>): Promise<D> {
    this.subscribeCalls += 1;
    let set = this.listeners.get(name);
    if (!set) {
      set = new Set();
      this.listeners.set(name, set);
    }
    set.add(listener);

    if (this.gate) await this.gate;

    const failure = this.failures.shift();
    if (failure !== undefined) {
      set.delete(listener);
      throw failure;
    }
    const descriptor = this.descriptors.get(name);
    if (descriptor === undefined) {
      set.delete(listener);
      throw new ResourceNotFoundError(this.kind, name);
    }
    return descriptor;
  }

  async unsubscribe(name: string, listener: DescriptorListener<D>): Promise<void> {
    this.unsubscribeCalls += 1;
    this.listeners.get(name)?.delete(listener);
  }

  /**
   * Store without notifying, as if it existed before anyone subscribed
   */
  seed(name: string, descriptor: D): void {
    this.descriptors.set(name, descriptor);
  }

  put(name: string, descriptor: D): void {
    this.descriptors.set(name, descriptor);
    for (const listener of [...(this.listeners.get(name) ?? [])]) {
      listener(name, descriptor);
    }
  }

  remove(name: string): void {
    this.descriptors.delete(name);
  }

  get(name: string): D | undefined {
    return this.descriptors.get(name);
  }

  failNextSubscribe(error: unknown): void {
    this.failures.push(error);
  }

  /**
   * Hold every subscribe until the returned function is called
   */
  hold(): () => void {
    let release: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = undefined;
        resolve();
      };
    });
    return release;
  }

  listenerCount(name: string): number {
    return this.listeners.get(name)?.size ?? 0;
  }
}

export type ReleasedCard = {
  card: RegistryAgentCard;
  options: ReleaseAgentCardOptions;
};

export type RegisteredEndpoints = {
  agentName: string;
  endpoints: AgentEndpoint[];
};

/**
 * Registry client backed by in-memory sources, recording writes
 */
export class InMemoryRegistryClient implements RegistryClient {
  readonly mcpServers = new InMemoryDescriptorSource<McpServerDetail>('mcp-server');
  readonly agentCards = new InMemoryDescriptorSource<RegistryAgentCard>('agent-card');
  readonly released: ReleasedCard[] = [];
  readonly registered: RegisteredEndpoints[] = [];
  getAgentCardError: unknown;
  closed = false;

  async getAgentCard(name: string, version?: string): Promise<RegistryAgentCard> {
    if (this.getAgentCardError !== undefined) throw this.getAgentCardError;
    const card = this.agentCards.get(name);
    if (!card || (version !== undefined && card.version !== version)) {
      throw new ResourceNotFoundError('agent-card', name);
    }
    return card;
  }

  async releaseAgentCard(card: RegistryAgentCard, options: ReleaseAgentCardOptions): Promise<void> {
    this.released.push({ card, options });
    this.agentCards.put(card.name, card);
  }

  async registerAgentEndpoints(agentName: string, endpoints: AgentEndpoint[]): Promise<void> {
    this.registered.push({ agentName, endpoints });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
