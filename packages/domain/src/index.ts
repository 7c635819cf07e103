export * from './types/maze.js';
export * from './types/player.js';
export * from './types/race.js';
export * from './types/events.js';
export * from './engine/errors.js';
export * from './engine/random.js';
export * from './engine/maze.js';
export * from './engine/race.js';
export * from './engine/snapshot.js';
