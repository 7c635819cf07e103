import type { GridPoint } from './maze.js';

export type SessionId = string;

export interface RacePlayer extends GridPoint {
  sessionId: SessionId;
  name: string;
  color: string;
  finished: boolean;
  /** 0 until the player reaches the goal. */
  finishRank: number;
  /** Whole seconds between round start and finish; 0 while unfinished. */
  finishTime: number;
  joinedAt: number;
}

/** Client-reported state. Coordinates are trusted as sent. */
export interface PlayerUpdate {
  x: number;
  y: number;
  name?: string;
  color?: string;
  finished?: boolean;
}

export interface PlayerView {
  x: number;
  y: number;
  name: string;
  color: string;
  finished: boolean;
  finishRank: number;
  finishTime: number;
}
