export { Board, isPieceSymbol, isSide } from './board';
export { EngineSession, withEngineSession } from './engine-session';
export { BoardError, ConfigError, EngineError } from './errors';
export type { BoardErrorCode, EngineErrorCode } from './errors';
export { formatHit, formatScore, shouldHighlight } from './format';
export type { FormatOptions } from './format';
export { LineReader } from './line-reader';
export { resolveConfig, USAGE } from './config';
export type { SearchConfig } from './config';
export { resolveExecutable, splitCandidates } from './resolve-executable';
export { runProgram } from './program';
export type { OutputStream, ProgramIO } from './program';
export { mulberry32, pick } from './rng';
export { parseBestMove, parseDepth, parseScore } from './score';
export { searchPositions } from './search';
export type { SearchHit, SearchOptions, SearchRejection } from './search';
export type {
  Cell,
  EngineExit,
  EngineProcess,
  EngineSessionOptions,
  EngineSessionState,
  EvaluateOptions,
  EvaluationResult,
  PieceSymbol,
  PositionStatus,
  Score,
  Side,
  SpawnEngine,
} from './types';
