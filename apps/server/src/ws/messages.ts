import type { RawData } from 'ws';
import type { PlayerUpdate, RaceSnapshot } from '@maze-race/domain';

/** The only client message: the player's self-reported state. */
export type ClientMessage = PlayerUpdate;

/** Pushed to every client after each mutation. */
export type ServerMessage = RaceSnapshot;

const INVALID = Symbol('invalid');

export function parseClientMessage(raw: RawData | string): ClientMessage | null {
  let data: unknown;

  try {
    data = JSON.parse(decodeRaw(raw));
  } catch {
    return null;
  }

  if (!isRecord(data)) {
    return null;
  }

  if (!Number.isInteger(data.x) || !Number.isInteger(data.y)) {
    return null;
  }
  const x = Number(data.x);
  const y = Number(data.y);

  const name = optionalString(data.name);
  const color = optionalString(data.color);
  const finished = optionalBoolean(data.finished);
  if (name === INVALID || color === INVALID || finished === INVALID) {
    return null;
  }

  return { x, y, name, color, finished };
}

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}

function optionalString(value: unknown): string | undefined | typeof INVALID {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : INVALID;
}

function optionalBoolean(value: unknown): boolean | undefined | typeof INVALID {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'boolean' ? value : INVALID;
}

function decodeRaw(raw: RawData | string): string {
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return raw.toString('utf8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
