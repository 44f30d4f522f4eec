// Conversation State
// Per-execute transcript, round counter and tool-call id counter

import type { Message, NewMessage, TerminationReason } from './types.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export class ConversationState {
  readonly maxRounds: number;
  private readonly log: Message[] = [];
  private currentRound = 0;
  private lastToolCallId = 0;
  private reason: TerminationReason | null = null;

  constructor(maxRounds: number) {
    this.maxRounds = maxRounds;
  }

  /** Messages are deep-frozen copies once appended; the index is their position in the conversation */
  append(message: NewMessage): Message {
    const frozen: Message = deepFreeze({ ...structuredClone(message), index: this.log.length });
    this.log.push(frozen);
    return frozen;
  }

  get messages(): readonly Message[] {
    return this.log.slice();
  }

  get round(): number {
    return this.currentRound;
  }

  get roundsExhausted(): boolean {
    return this.currentRound >= this.maxRounds;
  }

  startRound(): number {
    if (this.roundsExhausted) {
      throw new RangeError(`Round ${this.currentRound + 1} exceeds the limit of ${this.maxRounds}`);
    }
    return ++this.currentRound;
  }

  nextToolCallId(): number {
    return ++this.lastToolCallId;
  }

  get terminated(): boolean {
    return this.reason !== null;
  }

  get terminationReason(): TerminationReason | null {
    return this.reason;
  }

  // The first reason wins
  terminate(reason: TerminationReason): void {
    if (this.reason === null) {
      this.reason = reason;
    }
  }
}
