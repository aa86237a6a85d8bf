import type { ConversationTurn } from '../types/engine';

// Recent exchanges, oldest first. Overflow evicts from the front.
export class ConversationMemory {
  private turns: ConversationTurn[] = [];
  private maxTurns: number;

  constructor(capacity: number = 10) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ConversationMemory capacity must be a positive integer, got ${capacity}`);
    }
    this.maxTurns = capacity;
  }

  get capacity(): number {
    return this.maxTurns;
  }

  get size(): number {
    return this.turns.length;
  }

  append(turn: ConversationTurn) {
    this.turns.push(Object.freeze({ ...turn }));
    this.trim();
  }

  recent(count: number): ConversationTurn[] {
    if (count <= 0) return [];
    return this.turns.slice(-count);
  }

  all(): ConversationTurn[] {
    return [...this.turns];
  }

  setCapacity(capacity: number) {
    this.maxTurns = Math.max(1, Math.floor(capacity));
    this.trim();
  }

  clear() {
    this.turns = [];
  }

  private trim() {
    if (this.turns.length > this.maxTurns) {
      this.turns = this.turns.slice(-this.maxTurns);
    }
  }
}
