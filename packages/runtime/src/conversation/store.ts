import { randomUUID } from 'node:crypto';
import {
  CONVERSATION_DEFAULTS,
  GatewayError,
  type Conversation,
  type ConversationTurn,
  type TurnRole
} from '@glimpse/core';

export interface ConversationStoreOptions {
  ttlMs?: number;
  /** User+assistant pairs kept; older turns are evicted first. */
  maxTurns?: number;
  now?: () => Date;
  generateId?: () => string;
}

export interface ConversationStoreStats {
  activeConversations: number;
}

/**
 * In-memory conversation history with an idle TTL. Mutations touch one entry
 * synchronously; only `sweepExpired` removes entries in bulk.
 */
export class ConversationStore {
  private readonly conversations = new Map<string, Conversation>();
  private readonly ttlMs: number;
  private readonly maxTurns: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  public constructor(options: ConversationStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? CONVERSATION_DEFAULTS.TTL_SECONDS * 1000;
    this.maxTurns = options.maxTurns ?? CONVERSATION_DEFAULTS.MAX_TURNS;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  public create(): string {
    const id = this.generateId();
    const now = this.now();
    this.conversations.set(id, {
      id,
      turns: [],
      createdAt: now,
      lastActivityAt: now,
      maxTurns: this.maxTurns
    });
    return id;
  }

  /** False for unknown ids and for conversations idle past the TTL. */
  public exists(conversationId: string): boolean {
    return this.live(conversationId, this.now()) !== undefined;
  }

  public append(conversationId: string, role: TurnRole, content: string): void {
    const now = this.now();
    const conversation = this.live(conversationId, now);
    if (!conversation) {
      throw new GatewayError('ConversationNotFound', `Conversation ${conversationId} does not exist or has expired`, {
        details: { conversation_id: conversationId }
      });
    }

    const turn: ConversationTurn = Object.freeze({ role, content, occurredAt: now });
    conversation.turns.push(turn);
    if (now.getTime() > conversation.lastActivityAt.getTime()) {
      conversation.lastActivityAt = now;
    }

    const limit = 2 * conversation.maxTurns;
    while (conversation.turns.length > limit) {
      conversation.turns.shift();
    }
  }

  /** Oldest first. Unknown ids yield an empty history. */
  public history(conversationId: string): ConversationTurn[] {
    const conversation = this.live(conversationId, this.now());
    return conversation ? [...conversation.turns] : [];
  }

  public get(conversationId: string): Conversation | undefined {
    const conversation = this.live(conversationId, this.now());
    return conversation ? { ...conversation, turns: [...conversation.turns] } : undefined;
  }

  public delete(conversationId: string): boolean {
    return this.conversations.delete(conversationId);
  }

  /** Removes every conversation idle for longer than the TTL at `now`. */
  public sweepExpired(now: Date = this.now()): number {
    let removed = 0;
    for (const [id, conversation] of this.conversations) {
      if (this.isExpired(conversation, now)) {
        this.conversations.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  public stats(): ConversationStoreStats {
    return { activeConversations: this.conversations.size };
  }

  private live(conversationId: string, now: Date): Conversation | undefined {
    const conversation = this.conversations.get(conversationId);
    if (!conversation || this.isExpired(conversation, now)) {
      return undefined;
    }
    return conversation;
  }

  private isExpired(conversation: Conversation, now: Date): boolean {
    return now.getTime() - conversation.lastActivityAt.getTime() > this.ttlMs;
  }
}
