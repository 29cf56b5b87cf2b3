export { SerialLane } from './lane';
export {
  runWithDeadline,
  type DeadlineResult,
  type DeadlineTimeout,
  type DeadlineError,
  type DeadlineOutcome,
} from './deadline';
export {
  SourceRunner,
  normalizeReading,
  type PollDisposition,
  type SourceRunnerHooks,
} from './source-runner';
