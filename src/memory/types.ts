// src/memory/types.ts

export type Topic = 'technology' | 'business' | 'creative' | 'general';

export type Sentiment = 'positive' | 'negative' | 'neutral';

export interface TurnMetadata {
  agentUsed?: string;
  route?: 'specialist' | 'fallback';
  processingTime?: number;
  personalizationApplied?: boolean;
  proactiveSuggestionsCount?: number;
  realTimeDataUsed?: boolean;
  toolGapDetected?: boolean;
}

export interface ConversationTurn {
  timestamp: string;
  query: string;
  response: string;
  topics: Topic[];
  sentiment: Sentiment;
  /** 1..10 */
  complexity: number;
  metadata: TurnMetadata;
}

export interface UserProfile {
  preferredTopics: Partial<Record<Topic, number>>;
  avgComplexity: number;
  communicationStyle: 'formal' | 'casual';
  responseLengthPreference: 'short' | 'medium' | 'long';
  turnCount: number;
}

export interface UserContext {
  isNewUser: boolean;
  recentTopics: Topic[][];
  userPreferences: UserProfile | null;
  conversationFlow: ConversationTurn[];
  suggestedApproach: 'personalized' | 'standard';
}

// ── Durable memory ──────────────────────────────────────────────

export interface MemoryMetadata {
  userId: string;
  timestamp: string;
}

export interface MemoryDocument {
  id: string;
  document: string;
  metadata: MemoryMetadata;
}

export interface MemoryMatch extends MemoryDocument {
  score: number;
}
