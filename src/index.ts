export { JobSequencer, type AdmittedJob } from "./job-sequencer.js";
export { TimerSequencer } from "./timer-sequencer.js";
export { Sequencer, type Settlement } from "./sequencer.js";
export { SequenceState } from "./state.js";
export {
  ConfigError,
  DisposedError,
  DuplicateIndexError,
  InvalidIndexError,
  JobFailedError,
  ReentrantExecutionError,
  SequencerError,
} from "./errors.js";
export {
  SequencerSettingsSchema,
  TimerSettingsSchema,
  type SequencerConfig,
  type TimerSequencerConfig,
} from "./config.js";
export { makeLogger, makeNoopLogger, type Logger } from "./logger.js";
export { systemClock } from "./utils.js";
export { runDemo, type DemoOptions } from "./demo.js";
export type * from "./types.js";
