// src/memory/chatHistory.ts — per-user role/content history handed to the pipeline
import type { ChatMessage } from '@/types/core';

const MAX_MESSAGES = 40;

export class ChatHistoryStore {
  private readonly histories = new Map<string, ChatMessage[]>();

  get(userId: string): ChatMessage[] {
    return [...(this.histories.get(userId) ?? [])];
  }

  append(userId: string, ...messages: ChatMessage[]): void {
    const list = this.histories.get(userId) ?? [];
    list.push(...messages);
    if (list.length > MAX_MESSAGES) list.splice(0, list.length - MAX_MESSAGES);
    this.histories.set(userId, list);
  }

  clear(userId: string): void {
    this.histories.delete(userId);
  }
}
