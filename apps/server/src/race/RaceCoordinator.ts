import { EventEmitter } from 'node:events';
import { randomBytes } from 'node:crypto';
import {
  DEFAULT_MAZE_DIMENSIONS,
  EngineError,
  applyPlayerUpdate,
  buildRaceSnapshot,
  createRace,
  generateMaze,
  joinRace,
  leaveRace,
  resetRace,
  toMazeInfo,
  toPlayerView,
  type MazeCell,
  type MazeDimensions,
  type MazeInfo,
  type PlayerUpdate,
  type PlayerView,
  type RaceEvent,
  type RaceSnapshot,
  type RaceState,
  type RaceTransition,
  type SessionId,
} from '@maze-race/domain';
import { logger } from '../observability/logger.js';
import { RaceEventLog } from './eventLog.js';

export interface RaceCoordinatorOptions {
  maze?: MazeDimensions;
  now?: () => number;
  createSeed?: () => string;
}

export interface RaceResetNotice {
  round: number;
  snapshot: RaceSnapshot;
}

/**
 * Sole owner of the shared race: maze, registered players, rank counter and game-over
 * flag. Every method runs to completion synchronously, so each one is a single critical
 * section on the event loop and callers never observe a half-applied transition.
 */
export class RaceCoordinator extends EventEmitter {
  private state: RaceState;
  private readonly dimensions: MazeDimensions;
  private readonly now: () => number;
  private readonly createSeed: () => string;
  private readonly eventLog: RaceEventLog;
  private readonly log = logger.child({ context: { component: 'race-coordinator' } });

  constructor(options: RaceCoordinatorOptions = {}) {
    super();
    this.dimensions = options.maze ?? DEFAULT_MAZE_DIMENSIONS;
    this.now = options.now ?? Date.now;
    this.createSeed = options.createSeed ?? defaultSeed;
    this.eventLog = new RaceEventLog();
    this.state = createRace(this.buildMaze(), this.now());
  }

  get round() {
    return this.state.round;
  }

  get playerCount() {
    return this.state.players.size;
  }

  register(sessionId: SessionId): PlayerView {
    this.commit(joinRace(this.state, sessionId, this.now()));
    return this.viewOf(sessionId);
  }

  unregister(sessionId: SessionId): boolean {
    const present = this.state.players.has(sessionId);
    this.commit(leaveRace(this.state, sessionId));
    return present;
  }

  update(sessionId: SessionId, update: PlayerUpdate): PlayerView {
    this.commit(applyPlayerUpdate(this.state, sessionId, update, this.now()));
    return this.viewOf(sessionId);
  }

  snapshot(): RaceSnapshot {
    return buildRaceSnapshot(this.state);
  }

  /** Regenerates the maze and clears every player's progress in one step. */
  reset(): RaceSnapshot {
    const maze = this.buildMaze();
    this.commit(resetRace(this.state, maze, this.now()));
    const snapshot = buildRaceSnapshot(this.state);
    const notice: RaceResetNotice = { round: this.state.round, snapshot };
    this.emit('raceReset', notice);
    return snapshot;
  }

  getMazeCells(): MazeCell[][] {
    return this.state.maze.cells;
  }

  getMazeInfo(): MazeInfo {
    return toMazeInfo(this.state.maze);
  }

  getPlayerName(sessionId: SessionId): string | undefined {
    return this.state.players.get(sessionId)?.name;
  }

  recentEvents(limit?: number): RaceEvent[] {
    return this.eventLog.recent(limit);
  }

  private viewOf(sessionId: SessionId): PlayerView {
    const player = this.state.players.get(sessionId);
    if (!player) {
      throw new EngineError('PLAYER_NOT_FOUND', `Session ${sessionId} is not racing`);
    }
    return toPlayerView(player);
  }

  private commit(transition: RaceTransition) {
    this.state = transition.state;
    this.eventLog.record(this.state.round, transition.events, this.now());
  }

  private buildMaze() {
    const seed = this.createSeed();
    const startedAt = this.now();
    const maze = generateMaze(this.dimensions, seed);
    this.log.info('maze generated', {
      context: {
        width: maze.width,
        height: maze.height,
        goal: maze.goal,
        seed,
        durationMs: this.now() - startedAt,
      },
    });
    return maze;
  }
}

function defaultSeed() {
  return `${Date.now().toString(36)}:${randomBytes(8).toString('hex')}`;
}
