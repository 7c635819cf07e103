import type { MazeDimensions } from './maze.js';
import type { SessionId } from './player.js';

export interface RaceEventPayloads {
  PLAYER_JOINED: {
    sessionId: SessionId;
  };
  PLAYER_LEFT: {
    sessionId: SessionId;
    name: string;
    finished: boolean;
  };
  PLAYER_FINISHED: {
    sessionId: SessionId;
    name: string;
    finishRank: number;
    finishTime: number;
  };
  RACE_COMPLETED: {
    playerCount: number;
  };
  RACE_RESET: {
    maze: MazeDimensions & { seed: string };
    playerCount: number;
  };
}

export type RaceEventType = keyof RaceEventPayloads;

/** An engine transition's output before the server stamps it. */
export type EngineEvent = {
  [K in RaceEventType]: { type: K; payload: RaceEventPayloads[K] };
}[RaceEventType];

export interface RaceEventBase {
  eventIndex: number;
  round: number;
  timestamp: number;
}

export type RaceEvent = EngineEvent & RaceEventBase;
