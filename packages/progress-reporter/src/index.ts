/**
 * @module @devcrew/progress-reporter
 * UX-only progress feedback for devcrew pipelines.
 *
 * Events are invisible to pipeline logic; they exist for terminals and UIs.
 */

export { ProgressReporter } from './reporter.js';
export type { StepInfo } from './reporter.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressCallback,
  FlowKind,
  FlowStartedEvent,
  PhaseEvent,
  StepEvent,
  DebugAttemptEvent,
  FlowCompletedEvent,
} from './types.js';
