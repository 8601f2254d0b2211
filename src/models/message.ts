/**
 * Event bus message model
 */

import { v4 as uuidv4 } from 'uuid';
import { MessageType } from './enums';

/**
 * Message published on the event bus. Immutable after construction.
 * An absent recipient means broadcast.
 */
export interface Message {
  readonly id: string;
  readonly type: MessageType;
  readonly sender: string;
  readonly recipient?: string;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly timestamp: string;
}

export function createMessage(
  type: MessageType,
  sender: string,
  payload: Record<string, unknown> = {},
  recipient?: string
): Message {
  return Object.freeze({
    id: `msg-${uuidv4()}`,
    type,
    sender,
    recipient: recipient === '' ? undefined : recipient,
    payload: Object.freeze({ ...payload }),
    timestamp: new Date().toISOString(),
  });
}

export function isBroadcast(message: Message): boolean {
  return message.recipient === undefined;
}
