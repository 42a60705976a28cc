/**
 * Remote A2A agent called like a local one
 */

import { randomUUID } from 'node:crypto';
import type {
  AgentCard,
  Artifact,
  CancelTaskResponse,
  Message,
  MessageSendParams,
  Part,
  Task,
  TaskArtifactUpdateEvent,
  TaskIdParams,
  TaskState,
  TaskStatusUpdateEvent
} from '@a2a-js/sdk';
import { A2AClient } from '@a2a-js/sdk/client';
import {
  ConfigError,
  createEventEmitter,
  createMsg,
  createMutex,
  createSilentLogger,
  createTextMsg,
  type EventEmitter,
  errorData,
  InvalidParamError,
  type Logger,
  type Msg,
  type Mutex,
  toErrorMessage,
  TransportError
} from '@registry-bridge/core';
import type { AgentCardResolver } from './card-resolver.js';

export type A2aStreamEvent = Message | Task | TaskStatusUpdateEvent | TaskArtifactUpdateEvent;

/**
 * The part of an A2A client the agent uses
 */
export type A2aClientLike = {
  sendMessageStream(params: MessageSendParams): AsyncIterable<A2aStreamEvent>;
  cancelTask(params: TaskIdParams): Promise<CancelTaskResponse>;
};

export type A2aClientFactory = (card: AgentCard) => A2aClientLike | Promise<A2aClientLike>;

export const createSdkClient: A2aClientFactory = (card) => new A2AClient(card);

export type A2aAgentOptions = {
  /** Overrides the name taken from the agent card */
  name?: string;
  createClient?: A2aClientFactory;
  logger?: Logger;
};

type A2aAgentEvents = {
  'reasoning:chunk': Msg;
};

const DEFAULT_AGENT_NAME = 'A2aAgent';

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  'completed',
  'canceled',
  'failed',
  'rejected'
]);

type Exchange = {
  client: A2aClientLike;
  taskId?: string;
  state?: TaskState;
  statusMessage?: Message;
  artifacts: Map<string, Artifact>;
};

export class A2aAgent {
  private readonly resolver: AgentCardResolver;
  private readonly fixedName: string | undefined;
  private readonly createClient: A2aClientFactory;
  private readonly logger: Logger;
  private readonly mutex: Mutex = createMutex();
  private readonly events: EventEmitter<A2aAgentEvents>;
  private cardName: string | undefined;
  private contextId: string | undefined;
  // Task waiting for more input; the next call continues it
  private pendingTaskId: string | undefined;
  private current: Exchange | undefined;

  constructor(resolver: AgentCardResolver, options: A2aAgentOptions = {}) {
    this.resolver = resolver;
    this.fixedName = options.name;
    this.createClient = options.createClient ?? createSdkClient;
    this.logger = options.logger ?? createSilentLogger();
    this.events = createEventEmitter<A2aAgentEvents>(this.logger);
  }

  get name(): string {
    return this.fixedName ?? this.cardName ?? DEFAULT_AGENT_NAME;
  }

  /**
   * Status updates of the running task, as they arrive
   */
  onReasoningChunk(handler: (chunk: Msg) => void): () => void {
    this.events.on('reasoning:chunk', handler);
    return () => this.events.off('reasoning:chunk', handler);
  }

  /**
   * Send `input` to the remote agent and wait for its answer
   *
   * Calls on one agent run one at a time.
   */
  async call(input: Msg | Msg[]): Promise<Msg> {
    const msgs = Array.isArray(input) ? input : [input];
    if (msgs.length === 0) {
      throw new InvalidParamError('At least one message is required');
    }
    return this.mutex.runExclusive(() => this.exchange(msgs));
  }

  /**
   * Cancel the task of the running call
   */
  async interrupt(): Promise<Msg> {
    const exchange = this.current;
    const taskId = exchange?.taskId;
    if (!exchange || taskId === undefined) {
      return createTextMsg('assistant', 'No running task to interrupt.', this.name);
    }

    let text: string;
    try {
      const response = await exchange.client.cancelTask({ id: taskId });
      text = 'error' in response && response.error
        ? response.error.message
        : `Task ${taskId} interrupt successfully.`;
    } catch (error) {
      this.logger.warn(`Failed to interrupt task ${taskId}`, errorData(error));
      text = toErrorMessage(error);
    }
    return createTextMsg('assistant', text, this.name);
  }

  private async exchange(msgs: Msg[]): Promise<Msg> {
    const card = await this.resolver.getAgentCard();
    assertRpcUrl(card);
    this.cardName = card.name;

    const exchange: Exchange = {
      client: await this.createClient(card),
      artifacts: new Map()
    };
    const message = this.toA2aMessage(msgs);
    this.logger.info(`Sending message to remote agent ${this.name}`, { url: card.url });

    this.current = exchange;
    try {
      for await (const event of exchange.client.sendMessageStream({ message })) {
        const reply = this.handleEvent(exchange, event);
        if (reply) return reply;
      }
    } catch (error) {
      throw new TransportError(
        `Failed to get response from remote agent ${this.name}: ${toErrorMessage(error)}`,
        { cause: error }
      );
    } finally {
      this.current = undefined;
    }

    if (exchange.taskId !== undefined) return this.taskReply(exchange);
    throw new TransportError(`No response received from remote agent ${this.name}`);
  }

  private handleEvent(exchange: Exchange, event: A2aStreamEvent): Msg | undefined {
    switch (event.kind) {
      case 'message':
        if (event.contextId) this.contextId = event.contextId;
        this.pendingTaskId = undefined;
        return this.fromA2aMessage(event);

      case 'task':
        exchange.taskId = event.id;
        this.contextId = event.contextId;
        exchange.state = event.status.state;
        exchange.statusMessage = event.status.message;
        for (const artifact of event.artifacts ?? []) {
          exchange.artifacts.set(artifact.artifactId, artifact);
        }
        return TERMINAL_STATES.has(event.status.state) ? this.taskReply(exchange) : undefined;

      case 'artifact-update':
        exchange.taskId = event.taskId;
        mergeArtifact(exchange.artifacts, event.artifact, event.append === true);
        return undefined;

      case 'status-update':
        exchange.taskId = event.taskId;
        this.contextId = event.contextId;
        exchange.state = event.status.state;
        exchange.statusMessage = event.status.message;
        if (event.final || TERMINAL_STATES.has(event.status.state)) {
          return this.taskReply(exchange);
        }
        this.emitReasoning(event);
        return undefined;
    }
  }

  private emitReasoning(event: TaskStatusUpdateEvent): void {
    const text = event.status.message ? partsText(event.status.message.parts) : '';
    if (!text) return;
    this.events.emit(
      'reasoning:chunk',
      createMsg({
        role: 'assistant',
        name: this.name,
        content: [{ type: 'text', text }],
        metadata: { taskId: event.taskId, taskState: event.status.state }
      })
    );
  }

  private toA2aMessage(msgs: Msg[]): Message {
    const parts: Part[] = [];
    const metadata: Record<string, unknown> = {};
    for (const msg of msgs) {
      Object.assign(metadata, msg.metadata);
      for (const block of msg.content) {
        if (block.type === 'text') {
          if (block.text.trim()) parts.push({ kind: 'text', text: block.text });
        } else {
          parts.push({ kind: 'data', data: { ...block.data } });
        }
      }
    }
    if (parts.length === 0) parts.push({ kind: 'text', text: '' });

    const message: Message = {
      kind: 'message',
      messageId: randomUUID(),
      role: 'user',
      parts
    };
    if (this.contextId) message.contextId = this.contextId;
    if (this.pendingTaskId) message.taskId = this.pendingTaskId;
    if (Object.keys(metadata).length > 0) message.metadata = metadata;
    return message;
  }

  private fromA2aMessage(message: Message): Msg {
    const metadata: Record<string, unknown> = { ...message.metadata, messageId: message.messageId };
    if (message.taskId) metadata.taskId = message.taskId;
    if (message.contextId) metadata.contextId = message.contextId;
    return createMsg({
      role: message.role === 'user' ? 'user' : 'assistant',
      name: this.name,
      content: [{ type: 'text', text: partsText(message.parts) }],
      metadata
    });
  }

  private taskReply(exchange: Exchange): Msg {
    const taskId = exchange.taskId ?? '';
    const state = exchange.state ?? 'unknown';
    this.pendingTaskId = state === 'input-required' ? taskId : undefined;

    let text = '';
    if (state !== 'completed') {
      text = `Task ${taskId} status: ${state}`;
      const statusText = exchange.statusMessage ? partsText(exchange.statusMessage.parts) : '';
      if (statusText) text += `\nmessage: ${statusText}`;
    }
    const artifactText = [...exchange.artifacts.values()]
      .map((artifact) => partsText(artifact.parts))
      .filter((value) => value.length > 0)
      .join('\n');
    if (artifactText) text = text ? `${text}\n\n${artifactText}` : artifactText;
    if (!text) text = `Task ${taskId} completed`;

    return createMsg({
      role: 'assistant',
      name: this.name,
      content: [{ type: 'text', text }],
      metadata: {
        taskId,
        contextId: this.contextId,
        taskState: state,
        artifactCount: exchange.artifacts.size
      }
    });
  }
}

function assertRpcUrl(card: AgentCard): void {
  if (!card.url) {
    throw new ConfigError(`Agent card ${card.name} has no URL for RPC communication`);
  }
  let host = '';
  try {
    host = new URL(card.url).host;
  } catch (error) {
    throw new ConfigError(`Invalid RPC URL in agent card ${card.name}: ${card.url}`, { cause: error });
  }
  if (!host) {
    throw new ConfigError(`Invalid RPC URL in agent card ${card.name}: ${card.url}`);
  }
}

function partsText(parts: Part[]): string {
  return parts
    .map((part) => (part.kind === 'text' ? part.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}

/**
 * Streamed chunks of one artifact are appended; adjacent text parts join
 */
function mergeArtifact(artifacts: Map<string, Artifact>, artifact: Artifact, append: boolean): void {
  const existing = artifacts.get(artifact.artifactId);
  if (!append || !existing) {
    artifacts.set(artifact.artifactId, { ...artifact, parts: [...artifact.parts] });
    return;
  }

  const parts = [...existing.parts];
  for (const part of artifact.parts) {
    const last = parts[parts.length - 1];
    if (last?.kind === 'text' && part.kind === 'text') {
      parts[parts.length - 1] = { ...last, text: last.text + part.text };
    } else {
      parts.push(part);
    }
  }
  artifacts.set(artifact.artifactId, { ...existing, parts });
}
