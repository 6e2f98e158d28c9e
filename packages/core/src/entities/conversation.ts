export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
  readonly occurredAt: Date;
}

export interface Conversation {
  id: string;
  /** Oldest first. Never longer than `2 * maxTurns`. */
  turns: ConversationTurn[];
  createdAt: Date;
  lastActivityAt: Date;
  maxTurns: number;
}

/** Content recorded for the caller's side of an image exchange. */
export const USER_IMAGE_TURN = 'Image uploaded';

/** Text sent next to the image in the final user message. */
export const IMAGE_TURN_PROMPT = 'Describe what you see in this image.';
