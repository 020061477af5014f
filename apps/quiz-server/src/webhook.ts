/**
 * Messenger webhook payloads.
 *
 * Inbound events are validated item by item: anything that is not a plain
 * text message from a user (echoes, reactions, postbacks, read receipts) is
 * skipped rather than failing the whole batch.
 */
import { z } from 'zod';
import type { PlayerMessage } from '@chat-quiz/shared-types';

const SUPPORTED_OBJECTS = ['page', 'instagram'] as const;

export interface TextMessage {
  text: string;
  /** Sender, i.e. the player. */
  from: string;
  /** Recipient, i.e. the page or account the game runs on. */
  to: string;
}

const MessagingItemSchema = z.object({
  sender: z.object({ id: z.string() }),
  recipient: z.object({ id: z.string() }),
  message: z.object({
    text: z.string(),
    is_echo: z.boolean().optional(),
  }),
});

const EntrySchema = z.object({
  messaging: z.array(z.unknown()).optional(),
});

const PayloadSchema = z.object({
  object: z.string(),
  entry: z.array(z.unknown()).optional(),
});

/** Extracts text messages in payload order. Unknown shapes yield nothing. */
export function extractMessages(body: unknown): TextMessage[] {
  const payload = PayloadSchema.safeParse(body);
  if (!payload.success || !isSupportedObject(payload.data.object)) {
    return [];
  }

  const messages: TextMessage[] = [];
  for (const rawEntry of payload.data.entry ?? []) {
    const entry = EntrySchema.safeParse(rawEntry);
    if (!entry.success) continue;

    for (const rawItem of entry.data.messaging ?? []) {
      const item = MessagingItemSchema.safeParse(rawItem);
      if (!item.success || item.data.message.is_echo !== undefined) continue;
      messages.push({
        text: item.data.message.text,
        from: item.data.sender.id,
        to: item.data.recipient.id,
      });
    }
  }
  return messages;
}

function isSupportedObject(object: string): boolean {
  return SUPPORTED_OBJECTS.some((supported) => supported === object);
}

export function toPlayerMessage(message: TextMessage): PlayerMessage {
  return {
    playerId: { channelId: message.to, id: message.from },
    text: message.text,
  };
}

/**
 * Answers the platform's subscription handshake.
 * Returns the challenge to echo back, or undefined when the request must be refused.
 */
export function verifySubscription(query: Record<string, unknown>, verifyToken: string): string | undefined {
  const mode = query['hub.mode'];
  const token = query['hub.verify_token'];
  const challenge = query['hub.challenge'];
  if (mode !== 'subscribe' || token !== verifyToken || typeof challenge !== 'string') {
    return undefined;
  }
  return challenge;
}
