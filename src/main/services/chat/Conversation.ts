import { v4 as uuidv4 } from 'uuid';
import type { Turn, TurnRole } from '../../../shared/types';

export function createTurn(role: TurnRole, text: string, now: Date = new Date()): Turn {
  return Object.freeze({
    id: uuidv4(),
    role,
    text,
    timestamp: now.toISOString(),
  });
}

/**
 * The ordered turns of one chat session.
 *
 * Append-only while the session runs. clear() and replace() are the two
 * user-initiated exceptions and swap the whole sequence in one step.
 */
export class Conversation {
  private turns: readonly Turn[] = [];

  constructor(initial: readonly Turn[] = []) {
    this.replace(initial);
  }

  get length(): number {
    return this.turns.length;
  }

  append(turn: Turn): void {
    this.turns = [...this.turns, Object.freeze({ ...turn })];
  }

  /** Frozen copy; later appends do not show up in it. */
  snapshot(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }

  clear(): void {
    this.turns = [];
  }

  replace(turns: readonly Turn[]): void {
    this.turns = turns.map((turn) => Object.freeze({ ...turn }));
  }
}
