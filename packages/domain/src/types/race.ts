import type { Maze } from './maze.js';
import type { PlayerView, RacePlayer, SessionId } from './player.js';

export type RacePhase = 'ROUND_ACTIVE' | 'ROUND_OVER';

export interface RaceState {
  round: number;
  phase: RacePhase;
  maze: Maze;
  /** Iteration order is registration order. Treated as immutable; transitions copy it. */
  players: ReadonlyMap<SessionId, RacePlayer>;
  finishCounter: number;
  gameOver: boolean;
  startedAt: number;
}

/** Wire shape pushed to every client after each mutation. */
export interface RaceSnapshot {
  allFinished: boolean;
  gameOver: boolean;
  players: PlayerView[];
}
