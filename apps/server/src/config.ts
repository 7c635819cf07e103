import {
  DEFAULT_MAZE_DIMENSIONS,
  MAZE_PRESETS,
  isMazeSizePreset,
  normalizeMazeDimensions,
  type MazeDimensions,
} from '@maze-race/domain';

const DEFAULT_PORT = 8080;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_MAZE_SIZE = 'medium';

export interface ServerConfig {
  port: number;
  host: string;
  maze: MazeDimensions;
  /** Settings that were unusable and replaced by a default. */
  warnings: string[];
}

type Env = Record<string, string | undefined>;

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const warnings: string[] = [];
  return {
    port: resolvePort(env.PORT, warnings),
    host: env.HOST?.trim() || DEFAULT_HOST,
    maze: resolveMazeDimensions(env, warnings),
    warnings,
  };
}

function resolvePort(raw: string | undefined, warnings: string[]) {
  if (!raw || !raw.trim()) return DEFAULT_PORT;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isInteger(parsed) && parsed >= 0 && parsed <= 65535) {
    return parsed;
  }
  warnings.push(`PORT "${raw}" is not a valid port, using ${DEFAULT_PORT}`);
  return DEFAULT_PORT;
}

function resolveMazeDimensions(env: Env, warnings: string[]): MazeDimensions {
  const size = (env.MAZE_SIZE?.trim() || DEFAULT_MAZE_SIZE).toLowerCase();

  if (size === 'custom') {
    const width = parseInteger(env.MAZE_WIDTH);
    const height = parseInteger(env.MAZE_HEIGHT);
    const dimensions = normalizeMazeDimensions(width, height);
    if (dimensions.width !== width || dimensions.height !== height) {
      warnings.push(
        `custom maze ${env.MAZE_WIDTH ?? '?'}x${env.MAZE_HEIGHT ?? '?'} adjusted to ${dimensions.width}x${dimensions.height}`,
      );
    }
    return dimensions;
  }

  if (isMazeSizePreset(size)) {
    return { ...MAZE_PRESETS[size] };
  }

  warnings.push(`unknown MAZE_SIZE "${size}", using ${DEFAULT_MAZE_SIZE}`);
  return { ...DEFAULT_MAZE_DIMENSIONS };
}

function parseInteger(raw: string | undefined) {
  if (!raw || !raw.trim()) return Number.NaN;
  return Number(raw.trim());
}
