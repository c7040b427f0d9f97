export const DEFAULT_SEARCH_HISTORY_LIMIT = 5;

/** Recent distinct queries, oldest evicted first once `limit` is reached. */
export class SearchHistory {
  private readonly entries: string[] = [];

  constructor(private readonly limit: number = DEFAULT_SEARCH_HISTORY_LIMIT) {}

  record(query: string): void {
    if (this.entries.includes(query)) {
      return;
    }
    this.entries.push(query);
    while (this.entries.length > this.limit) {
      this.entries.shift();
    }
  }

  recent(): string[] {
    return [...this.entries].reverse();
  }

  get size(): number {
    return this.entries.length;
  }
}

export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
  at: string;
}

export class ChatHistory {
  private readonly turns: ChatTurn[] = [];

  append(role: ChatTurn["role"], content: string): void {
    this.turns.push({ role, content, at: new Date().toISOString() });
  }

  list(): ChatTurn[] {
    return [...this.turns];
  }
}

export interface SessionState {
  searches: SearchHistory;
  chat: ChatHistory;
}

export function createSessionState(
  searchHistoryLimit: number = DEFAULT_SEARCH_HISTORY_LIMIT,
): SessionState {
  return {
    searches: new SearchHistory(searchHistoryLimit),
    chat: new ChatHistory(),
  };
}
