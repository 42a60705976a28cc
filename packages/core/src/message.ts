import { randomUUID } from 'node:crypto';

export type TextBlock = {
  type: 'text';
  text: string;
};

export type DataBlock = {
  type: 'data';
  data: Record<string, unknown>;
};

export type ContentBlock = TextBlock | DataBlock;

export type MsgRole = 'user' | 'assistant' | 'system';

/**
 * Message exchanged with agents
 */
export type Msg = {
  id: string;
  name?: string;
  role: MsgRole;
  content: ContentBlock[];
  metadata?: Record<string, unknown>;
  timestamp: string;
};

export function createMsg(init: {
  role: MsgRole;
  content: ContentBlock[];
  name?: string;
  metadata?: Record<string, unknown>;
}): Msg {
  return {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    ...init
  };
}

export function createTextMsg(role: MsgRole, text: string, name?: string): Msg {
  return createMsg({ role, name, content: [{ type: 'text', text }] });
}

export function isTextBlock(block: ContentBlock): block is TextBlock {
  return block.type === 'text';
}

/**
 * Text blocks of a message joined by newlines
 */
export function getTextContent(msg: Msg): string {
  return msg.content
    .filter(isTextBlock)
    .map((block) => block.text)
    .join('\n');
}
