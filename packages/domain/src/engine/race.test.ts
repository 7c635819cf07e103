import { describe, expect, it } from 'vitest';
import { EngineError } from './errors.js';
import { generateMaze } from './maze.js';
import {
  DEFAULT_PLAYER_COLOR,
  DEFAULT_PLAYER_NAME,
  applyPlayerUpdate,
  createRace,
  isEveryoneFinished,
  joinRace,
  leaveRace,
  resetRace,
} from './race.js';
import type { RaceState } from '../types/race.js';

const START = 1_700_000_000_000;
const maze = generateMaze({ width: 31, height: 21 }, 'race-tests');

function raceWith(...sessionIds: string[]): RaceState {
  let state = createRace(maze, START);
  for (const sessionId of sessionIds) {
    state = joinRace(state, sessionId, START).state;
  }
  return state;
}

function finish(state: RaceState, sessionId: string, elapsedMs: number) {
  const player = state.players.get(sessionId);
  return applyPlayerUpdate(
    state,
    sessionId,
    { x: maze.goal.x, y: maze.goal.y, name: player?.name, color: player?.color, finished: true },
    START + elapsedMs,
  );
}

describe('race registration', () => {
  it('spawns new players at the entry with default profile', () => {
    const { state, events } = joinRace(createRace(maze, START), 'p1', START + 10);

    expect(state.players.get('p1')).toEqual({
      sessionId: 'p1',
      x: 1,
      y: 1,
      name: DEFAULT_PLAYER_NAME,
      color: DEFAULT_PLAYER_COLOR,
      finished: false,
      finishRank: 0,
      finishTime: 0,
      joinedAt: START + 10,
    });
    expect(events).toEqual([{ type: 'PLAYER_JOINED', payload: { sessionId: 'p1' } }]);
  });

  it('keeps registration order for numeric-looking session ids', () => {
    const state = raceWith('10', '2', 'b', '1');

    expect([...state.players.keys()]).toEqual(['10', '2', 'b', '1']);
  });

  it('refuses to register the same session twice', () => {
    const state = raceWith('p1');
    expect(() => joinRace(state, 'p1', START)).toThrow(EngineError);
  });

  it('treats leaving with an unknown session as a no-op', () => {
    const state = raceWith('p1');
    const result = leaveRace(state, 'ghost');

    expect(result.state).toBe(state);
    expect(result.events).toEqual([]);
  });
});

describe('player updates', () => {
  it('overwrites position, name and color', () => {
    const { state } = applyPlayerUpdate(
      raceWith('p1'),
      'p1',
      { x: 3, y: 5, name: 'Runner', color: '#4a9eff', finished: false },
      START,
    );

    expect(state.players.get('p1')).toMatchObject({ x: 3, y: 5, name: 'Runner', color: '#4a9eff', finished: false });
  });

  it('keeps the stored profile when a report omits it', () => {
    let state = applyPlayerUpdate(raceWith('p1'), 'p1', { x: 1, y: 3, name: 'Runner', color: '#00ff00' }, START).state;
    state = applyPlayerUpdate(state, 'p1', { x: 1, y: 5 }, START).state;

    expect(state.players.get('p1')).toMatchObject({ x: 1, y: 5, name: 'Runner', color: '#00ff00' });
  });

  it('accepts positions without checking them against the maze', () => {
    const { state } = applyPlayerUpdate(raceWith('p1'), 'p1', { x: 0, y: 0 }, START);
    expect(state.players.get('p1')).toMatchObject({ x: 0, y: 0 });
  });

  it('rejects updates for sessions that are not racing', () => {
    expect(() => applyPlayerUpdate(raceWith('p1'), 'p2', { x: 1, y: 1 }, START)).toThrow(
      /not racing/,
    );
  });
});

describe('finish ranking', () => {
  it('ranks finishers in arrival order with elapsed whole seconds', () => {
    let state = raceWith('p1', 'p2', 'p3');
    state = finish(state, 'p2', 5_400).state;
    state = finish(state, 'p3', 9_999).state;
    state = finish(state, 'p1', 12_000).state;

    expect(state.players.get('p2')).toMatchObject({ finishRank: 1, finishTime: 5 });
    expect(state.players.get('p3')).toMatchObject({ finishRank: 2, finishTime: 9 });
    expect(state.players.get('p1')).toMatchObject({ finishRank: 3, finishTime: 12 });
    expect(state.finishCounter).toBe(3);
  });

  it('emits a finish event carrying the assigned rank', () => {
    const state = applyPlayerUpdate(raceWith('p1', 'p2'), 'p1', { x: 1, y: 1, name: 'Ada' }, START).state;
    const result = finish(state, 'p1', 2_000);

    expect(result.events).toEqual([
      {
        type: 'PLAYER_FINISHED',
        payload: { sessionId: 'p1', name: 'Ada', finishRank: 1, finishTime: 2 },
      },
    ]);
  });

  it('ignores repeated finish reports', () => {
    let state = raceWith('p1', 'p2');
    state = finish(state, 'p1', 1_000).state;
    const repeat = finish(state, 'p1', 8_000);

    expect(repeat.state.players.get('p1')).toMatchObject({ finishRank: 1, finishTime: 1 });
    expect(repeat.state.finishCounter).toBe(1);
    expect(repeat.events).toEqual([]);
  });

  it('never un-finishes a player', () => {
    let state = finish(raceWith('p1', 'p2'), 'p1', 1_000).state;
    state = applyPlayerUpdate(state, 'p1', { x: 1, y: 1, finished: false }, START + 2_000).state;

    expect(state.players.get('p1')).toMatchObject({ finished: true, finishRank: 1, x: 1, y: 1 });
  });
});

describe('race completion', () => {
  it('ends the round once the last registered player finishes', () => {
    let state = raceWith('p1', 'p2');

    const first = finish(state, 'p1', 3_000);
    state = first.state;
    expect(state.players.get('p1')?.finishRank).toBe(1);
    expect(state.gameOver).toBe(false);
    expect(state.phase).toBe('ROUND_ACTIVE');

    const second = finish(state, 'p2', 4_000);
    state = second.state;
    expect(state.players.get('p2')?.finishRank).toBe(2);
    expect(state.gameOver).toBe(true);
    expect(state.phase).toBe('ROUND_OVER');
    expect(second.events.map((entry) => entry.type)).toEqual(['PLAYER_FINISHED', 'RACE_COMPLETED']);
  });

  it('completes only once per round', () => {
    let state = finish(raceWith('p1'), 'p1', 1_000).state;
    const again = applyPlayerUpdate(state, 'p1', { x: 2, y: 2, finished: true }, START + 5_000);
    state = again.state;

    expect(state.gameOver).toBe(true);
    expect(again.events).toEqual([]);
  });

  it('completes when the last unfinished player leaves', () => {
    let state = finish(raceWith('p1', 'p2'), 'p1', 1_000).state;
    const result = leaveRace(state, 'p2');
    state = result.state;

    expect(state.gameOver).toBe(true);
    expect(result.events.map((entry) => entry.type)).toEqual(['PLAYER_LEFT', 'RACE_COMPLETED']);
  });

  it('stays over after finished players disconnect', () => {
    let state = finish(raceWith('p1', 'p2'), 'p1', 1_000).state;
    state = finish(state, 'p2', 2_000).state;
    state = leaveRace(state, 'p1').state;
    state = leaveRace(state, 'p2').state;

    expect(state.players.size).toBe(0);
    expect(state.gameOver).toBe(true);
    expect(isEveryoneFinished(state)).toBe(false);
  });

  it('does not complete an empty race', () => {
    const state = leaveRace(raceWith('p1'), 'p1').state;
    expect(state.gameOver).toBe(false);
  });

  it('leaves other players untouched when one disconnects', () => {
    let state = raceWith('p1', 'p2', 'p3');
    state = finish(state, 'p1', 1_000).state;
    state = finish(state, 'p2', 2_000).state;
    state = leaveRace(state, 'p1').state;

    expect([...state.players.keys()]).toEqual(['p2', 'p3']);
    expect(state.players.get('p2')).toMatchObject({ finished: true, finishRank: 2, finishTime: 2 });
    expect(state.players.get('p3')?.finished).toBe(false);

    state = finish(state, 'p3', 3_000).state;
    expect(state.players.get('p3')?.finishRank).toBe(3);
  });
});

describe('race reset', () => {
  it('starts a fresh round on a new maze', () => {
    let state = raceWith('p1', 'p2');
    state = applyPlayerUpdate(state, 'p1', { x: 7, y: 9, name: 'Ada', color: '#111111' }, START).state;
    state = finish(state, 'p1', 1_000).state;
    state = finish(state, 'p2', 2_000).state;
    expect(state.gameOver).toBe(true);

    const nextMaze = generateMaze({ width: 31, height: 21 }, 'race-tests:2');
    const result = resetRace(state, nextMaze, START + 60_000);
    state = result.state;

    expect(state.round).toBe(2);
    expect(state.phase).toBe('ROUND_ACTIVE');
    expect(state.gameOver).toBe(false);
    expect(state.finishCounter).toBe(0);
    expect(state.startedAt).toBe(START + 60_000);
    expect(state.maze).toBe(nextMaze);
    expect(state.players.get('p1')).toMatchObject({
      x: 1,
      y: 1,
      name: 'Ada',
      color: '#111111',
      finished: false,
      finishRank: 0,
      finishTime: 0,
    });
    expect(result.events).toEqual([
      {
        type: 'RACE_RESET',
        payload: { maze: { width: 31, height: 21, seed: 'race-tests:2' }, playerCount: 2 },
      },
    ]);
  });

  it('measures finish times from the new round start', () => {
    let state = resetRace(raceWith('p1', 'p2'), maze, START + 30_000).state;
    state = finish(state, 'p1', 37_500).state;

    expect(state.players.get('p1')).toMatchObject({ finishRank: 1, finishTime: 7 });
  });
});
