import {
  PASSAGE,
  WALL,
  type GridPoint,
  type Maze,
  type MazeCell,
  type MazeDimensions,
  type MazeInfo,
  type MazeSizePreset,
} from '../types/maze.js';
import { assertEngine } from './errors.js';
import { createRandom, shuffleInPlace, type RandomSource } from './random.js';

export const MIN_MAZE_DIMENSION = 11;
export const DEFAULT_MAZE_DIMENSIONS: MazeDimensions = { width: 71, height: 41 };
export const SPAWN_POINT: GridPoint = { x: 1, y: 1 };

export const MAZE_PRESETS: Record<MazeSizePreset, MazeDimensions> = {
  small: { width: 31, height: 21 },
  medium: { width: 71, height: 41 },
  large: { width: 101, height: 61 },
  huge: { width: 151, height: 81 },
};

type Step = readonly [dx: number, dy: number];

const LATTICE_STEPS: readonly Step[] = [
  [0, 2],
  [0, -2],
  [2, 0],
  [-2, 0],
];

interface CarveFrame extends GridPoint {
  steps: Step[];
  next: number;
}

/**
 * Coerces requested dimensions into ones the generator accepts. Anything below the
 * minimum (or not an integer) falls back to the default size on both axes; even sides
 * are bumped to the next odd number.
 */
export function normalizeMazeDimensions(width: number, height: number): MazeDimensions {
  if (!isUsableSide(width) || !isUsableSide(height)) {
    return { ...DEFAULT_MAZE_DIMENSIONS };
  }
  return {
    width: width % 2 === 0 ? width + 1 : width,
    height: height % 2 === 0 ? height + 1 : height,
  };
}

export function isMazeSizePreset(value: string): value is MazeSizePreset {
  return Object.hasOwn(MAZE_PRESETS, value);
}

/**
 * Carves a perfect maze with a randomized depth-first walk over the odd-coordinate
 * lattice, starting at the spawn cell. The walk is iterative, so the maze area is not
 * bounded by the call stack.
 */
export function generateMaze(dimensions: MazeDimensions, seed: string): Maze {
  const { width, height } = dimensions;
  assertEngine(
    isOddSide(width) && isOddSide(height),
    'INVALID_DIMENSIONS',
    `Maze dimensions must be odd integers >= ${MIN_MAZE_DIMENSION} (got ${width}x${height})`,
  );

  const cells: MazeCell[][] = Array.from({ length: height }, () =>
    new Array<MazeCell>(width).fill(WALL),
  );
  carveFrom(cells, SPAWN_POINT, createRandom(seed));

  const goal = locateGoal(width, height);
  // The walk always reaches it for valid sizes; carving again keeps the goal open regardless.
  cells[goal.y][goal.x] = PASSAGE;

  return { width, height, cells, goal, seed };
}

export function locateGoal(width: number, height: number): GridPoint {
  let x = width - 2;
  let y = height - 2;
  if (x % 2 === 0) x -= 1;
  if (y % 2 === 0) y -= 1;
  return { x, y };
}

export function isPassage(maze: Maze, point: GridPoint): boolean {
  return maze.cells[point.y]?.[point.x] === PASSAGE;
}

export function toMazeInfo(maze: Maze): MazeInfo {
  return {
    goalX: maze.goal.x,
    goalY: maze.goal.y,
    width: maze.width,
    height: maze.height,
  };
}

function carveFrom(cells: MazeCell[][], start: GridPoint, random: RandomSource) {
  const height = cells.length;
  const width = cells[0].length;

  const enter = (x: number, y: number): CarveFrame => {
    cells[y][x] = PASSAGE;
    return { x, y, steps: shuffleInPlace([...LATTICE_STEPS], random), next: 0 };
  };

  const stack: CarveFrame[] = [enter(start.x, start.y)];
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next >= frame.steps.length) {
      stack.pop();
      continue;
    }

    const [dx, dy] = frame.steps[frame.next];
    frame.next += 1;
    const nx = frame.x + dx;
    const ny = frame.y + dy;
    if (nx > 0 && nx < width - 1 && ny > 0 && ny < height - 1 && cells[ny][nx] === WALL) {
      cells[frame.y + dy / 2][frame.x + dx / 2] = PASSAGE;
      stack.push(enter(nx, ny));
    }
  }
}

function isUsableSide(value: number) {
  return Number.isInteger(value) && value >= MIN_MAZE_DIMENSION;
}

function isOddSide(value: number) {
  return isUsableSide(value) && value % 2 === 1;
}
