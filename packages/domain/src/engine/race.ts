import type { EngineEvent } from '../types/events.js';
import type { Maze } from '../types/maze.js';
import type { PlayerUpdate, RacePlayer, SessionId } from '../types/player.js';
import type { RaceState } from '../types/race.js';
import { EngineError, assertEngine } from './errors.js';
import { SPAWN_POINT } from './maze.js';

export const DEFAULT_PLAYER_NAME = 'Anon';
export const DEFAULT_PLAYER_COLOR = '#ff0000';

export interface RaceTransition {
  state: RaceState;
  events: EngineEvent[];
}

export function createRace(maze: Maze, startedAt: number): RaceState {
  return {
    round: 1,
    phase: 'ROUND_ACTIVE',
    maze,
    players: new Map<SessionId, RacePlayer>(),
    finishCounter: 0,
    gameOver: false,
    startedAt,
  };
}

export function joinRace(state: RaceState, sessionId: SessionId, joinedAt: number): RaceTransition {
  assertEngine(
    !state.players.has(sessionId),
    'DUPLICATE_SESSION',
    `Session ${sessionId} is already racing`,
  );

  const player: RacePlayer = {
    sessionId,
    x: SPAWN_POINT.x,
    y: SPAWN_POINT.y,
    name: DEFAULT_PLAYER_NAME,
    color: DEFAULT_PLAYER_COLOR,
    finished: false,
    finishRank: 0,
    finishTime: 0,
    joinedAt,
  };

  return {
    state: {
      ...state,
      players: new Map(state.players).set(sessionId, player),
    },
    events: [{ type: 'PLAYER_JOINED', payload: { sessionId } }],
  };
}

/** Removing an unknown session is a no-op. */
export function leaveRace(state: RaceState, sessionId: SessionId): RaceTransition {
  const leaving = state.players.get(sessionId);
  if (!leaving) {
    return { state, events: [] };
  }

  const players = new Map(state.players);
  players.delete(sessionId);

  const events: EngineEvent[] = [
    { type: 'PLAYER_LEFT', payload: { sessionId, name: leaving.name, finished: leaving.finished } },
  ];
  return settleCompletion({ ...state, players }, events);
}

/**
 * Overwrites a player's reported position and profile. The first `finished: true`
 * report assigns the next rank and the elapsed whole seconds since round start; later
 * reports never re-rank.
 */
export function applyPlayerUpdate(
  state: RaceState,
  sessionId: SessionId,
  update: PlayerUpdate,
  now: number,
): RaceTransition {
  const current = state.players.get(sessionId);
  if (!current) {
    throw new EngineError('PLAYER_NOT_FOUND', `Session ${sessionId} is not racing`);
  }

  const next: RacePlayer = {
    ...current,
    x: update.x,
    y: update.y,
    name: update.name ?? current.name,
    color: update.color ?? current.color,
  };

  const events: EngineEvent[] = [];
  let finishCounter = state.finishCounter;

  if (update.finished === true && !current.finished) {
    finishCounter += 1;
    next.finished = true;
    next.finishRank = finishCounter;
    next.finishTime = Math.max(0, Math.floor((now - state.startedAt) / 1000));
    events.push({
      type: 'PLAYER_FINISHED',
      payload: {
        sessionId,
        name: next.name,
        finishRank: next.finishRank,
        finishTime: next.finishTime,
      },
    });
  }

  return settleCompletion(
    {
      ...state,
      finishCounter,
      players: new Map(state.players).set(sessionId, next),
    },
    events,
  );
}

/**
 * Starts a new round on a fresh maze. Connected players stay registered but go back to
 * spawn with their finish state cleared.
 */
export function resetRace(state: RaceState, maze: Maze, startedAt: number): RaceTransition {
  const players = new Map<SessionId, RacePlayer>();
  for (const [sessionId, player] of state.players) {
    players.set(sessionId, {
      ...player,
      x: SPAWN_POINT.x,
      y: SPAWN_POINT.y,
      finished: false,
      finishRank: 0,
      finishTime: 0,
    });
  }

  return {
    state: {
      round: state.round + 1,
      phase: 'ROUND_ACTIVE',
      maze,
      players,
      finishCounter: 0,
      gameOver: false,
      startedAt,
    },
    events: [
      {
        type: 'RACE_RESET',
        payload: {
          maze: { width: maze.width, height: maze.height, seed: maze.seed },
          playerCount: players.size,
        },
      },
    ],
  };
}

export function getRacePlayers(state: RaceState): RacePlayer[] {
  return [...state.players.values()];
}

export function isEveryoneFinished(state: RaceState): boolean {
  const players = getRacePlayers(state);
  return players.length > 0 && players.every((player) => player.finished);
}

function settleCompletion(state: RaceState, events: EngineEvent[]): RaceTransition {
  if (state.gameOver || !isEveryoneFinished(state)) {
    return { state, events };
  }

  return {
    state: { ...state, gameOver: true, phase: 'ROUND_OVER' },
    events: [
      ...events,
      { type: 'RACE_COMPLETED', payload: { playerCount: getRacePlayers(state).length } },
    ],
  };
}
