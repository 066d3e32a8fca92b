export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

const ROLE_LABELS: Record<TurnRole, string> = {
  user: 'User',
  assistant: 'Assistant'
};

export class ConversationContext {
  private turns: ConversationTurn[] = [];

  append(role: TurnRole, content: string) {
    this.turns.push({ role, content });
  }

  /** One `<Role>: <content>` line per turn, newline-terminated. */
  render(): string {
    return this.turns.map((t) => `${ROLE_LABELS[t.role]}: ${t.content}\n`).join('');
  }

  snapshot(): ConversationTurn[] {
    return this.turns.map((t) => ({ ...t }));
  }

  clear() {
    this.turns = [];
  }

  get length(): number {
    return this.turns.length;
  }
}
