export {
  GameBoard,
  MAX_CELLS,
  DEFAULT_BACKGROUND,
  DEFAULT_FOREGROUND,
  BLANK_SYMBOL,
  createDefaultCell,
} from './board';
export type { Cell } from './board';

export {
  InputSnapshot,
  InputStateMachine,
  Controls,
  LOGICAL_KEYS,
  DEFAULT_FIRE_COOLDOWN,
  isLogicalKey,
} from './input';
export type { LogicalKey, InputSample } from './input';

export {
  encodeFrame,
  decodeFrame,
  runLengthEncode,
  runLengthDecode,
  formatRuns,
  parseRuns,
  serializeFrame,
  parseFrame,
} from './encoder';
export type { Channel, DecodedFrame, EncodedFrame, EncodeOptions, FrameEncoding, Run } from './encoder';

export { FrameScheduler } from './scheduler';
export type {
  FrameRenderer,
  FrameSchedulerOptions,
  Game,
  GameContext,
  RenderOutcome,
  SchedulerState,
  SchedulerStats,
  StopReason,
} from './scheduler';

export { systemClock } from './clock';
export type { Clock, SleepResult } from './clock';

export {
  readFrameLimit,
  resolveEngineConfig,
  FRAME_LIMIT_ENV,
  DEFAULT_FPS,
  DEFAULT_WARMUP_MS,
} from './config';
export type { EngineConfig, EngineConfigOptions, Logger } from './config';

export {
  GridLoopError,
  ConfigurationError,
  BoundsError,
  InvalidCellValueError,
  FrameDecodeError,
  SchedulerStateError,
} from './errors';
export type { GridLoopErrorCode } from './errors';
