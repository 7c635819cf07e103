import { describe, expect, it } from 'vitest';
import { loadServerConfig } from './config.js';

describe('loadServerConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadServerConfig({});

    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.maze).toEqual({ width: 71, height: 41 });
    expect(config.warnings).toEqual([]);
  });

  it('reads port, host and a size preset', () => {
    const config = loadServerConfig({ PORT: '9001', HOST: '127.0.0.1', MAZE_SIZE: 'Small' });

    expect(config.port).toBe(9001);
    expect(config.host).toBe('127.0.0.1');
    expect(config.maze).toEqual({ width: 31, height: 21 });
    expect(config.warnings).toEqual([]);
  });

  it('falls back to the default port when PORT is unusable', () => {
    const config = loadServerConfig({ PORT: 'abc' });

    expect(config.port).toBe(8080);
    expect(config.warnings).toEqual(['PORT "abc" is not a valid port, using 8080']);
  });

  it('accepts custom odd dimensions as given', () => {
    const config = loadServerConfig({ MAZE_SIZE: 'custom', MAZE_WIDTH: '25', MAZE_HEIGHT: '15' });

    expect(config.maze).toEqual({ width: 25, height: 15 });
    expect(config.warnings).toEqual([]);
  });

  it('bumps even custom dimensions to odd ones', () => {
    const config = loadServerConfig({ MAZE_SIZE: 'custom', MAZE_WIDTH: '30', MAZE_HEIGHT: '20' });

    expect(config.maze).toEqual({ width: 31, height: 21 });
    expect(config.warnings).toEqual(['custom maze 30x20 adjusted to 31x21']);
  });

  it('falls back to the default maze when custom dimensions are missing or too small', () => {
    expect(loadServerConfig({ MAZE_SIZE: 'custom' }).maze).toEqual({ width: 71, height: 41 });
    expect(
      loadServerConfig({ MAZE_SIZE: 'custom', MAZE_WIDTH: '5', MAZE_HEIGHT: '41' }).warnings,
    ).toEqual(['custom maze 5x41 adjusted to 71x41']);
  });

  it('warns on an unknown size name', () => {
    const config = loadServerConfig({ MAZE_SIZE: 'toString' });

    expect(config.maze).toEqual({ width: 71, height: 41 });
    expect(config.warnings).toEqual(['unknown MAZE_SIZE "tostring", using medium']);
  });
});
