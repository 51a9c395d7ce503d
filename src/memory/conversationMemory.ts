// src/memory/conversationMemory.ts — per-user turn history and profile derived from it
import type { ConversationTurn, Sentiment, Topic, TurnMetadata, UserContext, UserProfile } from './types';

export const MAX_TURNS_PER_USER = 50;
const CONTEXT_WINDOW = 5;

const TOPIC_KEYWORDS: Array<[Exclude<Topic, 'general'>, string[]]> = [
  ['technology', ['ai', 'machine learning', 'python', 'data', 'programming', 'technology']],
  ['business', ['market', 'stock', 'finance', 'business', 'economy', 'investment']],
  ['creative', ['story', 'creative', 'write', 'art', 'design', 'poem']],
];

const POSITIVE_WORDS = ['good', 'great', 'excellent', 'amazing', 'love', 'like', 'awesome'];
const NEGATIVE_WORDS = ['bad', 'terrible', 'hate', 'awful', 'worst', 'horrible'];
const TECHNICAL_TERMS = ['analyze', 'compare', 'explain', 'implement', 'algorithm', 'optimize'];

export function extractTopics(text: string): Topic[] {
  const lower = text.toLowerCase();
  const topics = TOPIC_KEYWORDS.filter(([, words]) => words.some((w) => lower.includes(w))).map(
    ([topic]) => topic,
  );
  return topics.length > 0 ? topics : ['general'];
}

export function analyzeSentiment(text: string): Sentiment {
  const lower = text.toLowerCase();
  const positive = POSITIVE_WORDS.filter((w) => lower.includes(w)).length;
  const negative = NEGATIVE_WORDS.filter((w) => lower.includes(w)).length;
  if (positive > negative) return 'positive';
  if (negative > positive) return 'negative';
  return 'neutral';
}

/** Integer score in [1, 10] from length, technical vocabulary and question marks. */
export function calculateComplexity(query: string): number {
  let score = 1;
  if (query.length > 100) score += 2;
  else if (query.length > 50) score += 1;

  const lower = query.toLowerCase();
  score += TECHNICAL_TERMS.filter((term) => lower.includes(term)).length;

  const questionMarks = query.split('?').length - 1;
  score += Math.min(questionMarks, 3);

  return Math.min(score, 10);
}

function emptyProfile(): UserProfile {
  return {
    preferredTopics: {},
    avgComplexity: 0,
    communicationStyle: 'formal',
    responseLengthPreference: 'medium',
    turnCount: 0,
  };
}

export class ConversationMemory {
  private readonly turns = new Map<string, ConversationTurn[]>();
  private readonly profiles = new Map<string, UserProfile>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Append a turn and fold it into the user's profile. Synchronous, so never interleaved. */
  addConversationTurn(
    userId: string,
    query: string,
    response: string,
    metadata: TurnMetadata = {},
  ): ConversationTurn {
    const turn: ConversationTurn = {
      timestamp: this.now().toISOString(),
      query,
      response,
      topics: extractTopics(query),
      sentiment: analyzeSentiment(query),
      complexity: calculateComplexity(query),
      metadata,
    };

    const history = this.turns.get(userId) ?? [];
    history.push(turn);
    if (history.length > MAX_TURNS_PER_USER) {
      history.splice(0, history.length - MAX_TURNS_PER_USER);
    }
    this.turns.set(userId, history);

    this.updateProfile(userId, turn);
    return turn;
  }

  getContextForQuery(userId: string, query: string): UserContext {
    const history = this.turns.get(userId) ?? [];
    if (history.length === 0) {
      return {
        isNewUser: true,
        recentTopics: [],
        userPreferences: null,
        conversationFlow: [],
        suggestedApproach: 'standard',
      };
    }

    const recent = history.slice(-CONTEXT_WINDOW);
    const profile = this.profiles.get(userId) ?? emptyProfile();
    const queryTopics = extractTopics(query);
    const known = queryTopics.some((t) => (profile.preferredTopics[t] ?? 0) > 0);

    return {
      isNewUser: false,
      recentTopics: recent.map((t) => t.topics),
      userPreferences: { ...profile, preferredTopics: { ...profile.preferredTopics } },
      conversationFlow: recent,
      suggestedApproach: known ? 'personalized' : 'standard',
    };
  }

  getRecentTurns(userId: string, count: number): ConversationTurn[] {
    return (this.turns.get(userId) ?? []).slice(-count);
  }

  getProfile(userId: string): UserProfile | null {
    return this.profiles.get(userId) ?? null;
  }

  clear(userId: string): void {
    this.turns.delete(userId);
    this.profiles.delete(userId);
  }

  private updateProfile(userId: string, turn: ConversationTurn): void {
    const profile = this.profiles.get(userId) ?? emptyProfile();
    for (const topic of turn.topics) {
      profile.preferredTopics[topic] = (profile.preferredTopics[topic] ?? 0) + 1;
    }
    profile.turnCount++;
    profile.avgComplexity =
      profile.avgComplexity + (turn.complexity - profile.avgComplexity) / profile.turnCount;
    this.profiles.set(userId, profile);
  }
}
