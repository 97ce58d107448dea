export type EngineErrorCode =
  | 'ENGINE_NOT_STARTED'
  | 'ENGINE_ALREADY_STARTED'
  | 'ENGINE_NOT_READY'
  | 'ENGINE_NO_POSITION'
  | 'ENGINE_START_FAILED'
  | 'ENGINE_EXITED'
  | 'ENGINE_PROTOCOL'
  | 'POSITION_MISMATCH'
  | 'MALFORMED_SCORE';

/**
 * Fatal engine error: wrong lifecycle state, or a broken protocol contract.
 * A crash while loading a position is not one of these; it is reported as
 * the 'fault' status instead.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EngineError';
    this.code = code;
  }
}

export type BoardErrorCode =
  | 'INVALID_SIDE'
  | 'INVALID_PIECE'
  | 'NO_EMPTY_SQUARE';

export class BoardError extends Error {
  readonly code: BoardErrorCode;

  constructor(code: BoardErrorCode, message: string) {
    super(message);
    this.name = 'BoardError';
    this.code = code;
  }
}

/** Invalid command-line flag or environment value. */
export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigError';
  }
}
