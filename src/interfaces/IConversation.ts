import { MessageHandle, MessageRole } from '../types/core';

/**
 * Conversation Interface
 * Owns the transcript; the orchestrator only appends and mutates
 */
export interface IConversation {
  /**
   * Append a message and return a handle for later mutation
   */
  appendMessage(role: MessageRole, text: string): MessageHandle;

  /**
   * Append text to an existing message
   */
  mutateMessageText(handle: MessageHandle, appendedText: string): void;

  /**
   * Mark a message as final; further mutation is rejected
   */
  sealMessage(handle: MessageHandle): void;
}
