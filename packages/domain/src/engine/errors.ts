export type EngineErrorCode =
  | 'INVALID_DIMENSIONS'
  | 'PLAYER_NOT_FOUND'
  | 'DUPLICATE_SESSION';

export class EngineError extends Error {
  constructor(public readonly code: EngineErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

export function assertEngine(condition: boolean, code: EngineErrorCode, message: string): asserts condition {
  if (!condition) {
    throw new EngineError(code, message);
  }
}
