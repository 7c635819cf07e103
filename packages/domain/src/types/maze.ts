export type MazeCell = 0 | 1;

export const PASSAGE: MazeCell = 0;
export const WALL: MazeCell = 1;

export interface GridPoint {
  x: number;
  y: number;
}

export interface MazeDimensions {
  width: number;
  height: number;
}

export interface Maze extends MazeDimensions {
  /** Row-major: `cells[y][x]`, `height` rows of `width` cells. */
  cells: MazeCell[][];
  goal: GridPoint;
  seed: string;
}

export interface MazeInfo {
  goalX: number;
  goalY: number;
  width: number;
  height: number;
}

export type MazeSizePreset = 'small' | 'medium' | 'large' | 'huge';
