/**
 * In-memory Conversation
 * Holds an ordered transcript of messages
 */

import { v4 as uuidv4 } from 'uuid';
import { IConversation } from '../interfaces/IConversation';
import { ConversationError, Message, MessageHandle, MessageRole } from '../types/core';

export class InMemoryConversation implements IConversation {
  readonly id: string;
  readonly title: string;
  private messages: Message[] = [];
  private nextSequence: number = 0;

  constructor(title: string = 'New Council Session', id: string = uuidv4()) {
    this.id = id;
    this.title = title;
  }

  appendMessage(role: MessageRole, text: string): MessageHandle {
    const message: Message = {
      id: uuidv4(),
      role,
      text,
      sequence: this.nextSequence++,
      createdAt: new Date(),
      sealed: false
    };
    this.messages.push(message);
    return { id: message.id };
  }

  mutateMessageText(handle: MessageHandle, appendedText: string): void {
    const message = this.requireMessage(handle);
    if (message.sealed) {
      throw new ConversationError(message.id, `Message ${message.id} is sealed`);
    }
    message.text += appendedText;
  }

  sealMessage(handle: MessageHandle): void {
    this.requireMessage(handle).sealed = true;
  }

  /**
   * Copies of the messages in creation order
   */
  getMessages(): Message[] {
    return this.messages.map((message) => ({ ...message }));
  }

  getMessage(handle: MessageHandle): Message | undefined {
    const message = this.messages.find((m) => m.id === handle.id);
    return message ? { ...message } : undefined;
  }

  private requireMessage(handle: MessageHandle): Message {
    const message = this.messages.find((m) => m.id === handle.id);
    if (!message) {
      throw new ConversationError(handle.id, `Unknown message ${handle.id}`);
    }
    return message;
  }
}
