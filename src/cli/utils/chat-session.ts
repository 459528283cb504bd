/**
 * Chat Session
 *
 * The REPL's memory: the turns asked so far and the current mode. The
 * pipeline keeps nothing between questions; everything a chat remembers
 * lives here.
 */

import { randomUUID } from 'node:crypto';

import type { QueryMode, QueryResult } from '../../agent/types.js';

export interface ChatTurn {
  query: string;
  mode: QueryMode;
  result: QueryResult;
  at: Date;
}

/** Oldest turns are dropped past this many */
export const MAX_CHAT_TURNS = 200;

export class ChatSession {
  /** Groups this session's traces */
  readonly id: string;
  private currentMode: QueryMode;
  private readonly turns: ChatTurn[] = [];

  constructor(mode: QueryMode = 'grounded', id: string = randomUUID()) {
    this.currentMode = mode;
    this.id = id;
  }

  get mode(): QueryMode {
    return this.currentMode;
  }

  setMode(mode: QueryMode): void {
    this.currentMode = mode;
  }

  /**
   * Append a turn for a finished question.
   */
  record(result: QueryResult, at: Date = new Date()): ChatTurn {
    const turn: ChatTurn = { query: result.query, mode: result.mode, result, at };
    this.turns.push(turn);
    if (this.turns.length > MAX_CHAT_TURNS) {
      this.turns.shift();
    }
    return turn;
  }

  get history(): readonly ChatTurn[] {
    return this.turns;
  }

  /** Most recent turn, if any */
  get lastTurn(): ChatTurn | undefined {
    return this.turns.at(-1);
  }

  /** Most recent grounded turn that succeeded */
  get lastGroundedTurn(): ChatTurn | undefined {
    for (let i = this.turns.length - 1; i >= 0; i--) {
      const turn = this.turns[i];
      if (turn && turn.mode === 'grounded' && turn.result.error === null) {
        return turn;
      }
    }
    return undefined;
  }

  clear(): void {
    this.turns.length = 0;
  }
}
