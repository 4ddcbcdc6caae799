/**
 * Type definitions for pipeline progress events.
 */

import type { LLMTier } from '@devcrew/crew-contracts';

/**
 * Progress event types.
 */
export type ProgressEventType =
  | 'flow_started'
  | 'phase_started'
  | 'phase_completed'
  | 'step_started'
  | 'step_completed'
  | 'step_skipped'
  | 'step_failed'
  | 'debug_attempt'
  | 'flow_completed';

export type FlowKind = 'iterate' | 'new_project';

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
}

export interface FlowStartedEvent extends BaseProgressEvent {
  type: 'flow_started';
  data: {
    flow: FlowKind;
    description: string;
  };
}

export interface PhaseEvent extends BaseProgressEvent {
  type: 'phase_started' | 'phase_completed';
  data: {
    phase: string;
    counts?: Record<string, number>; // Only for 'completed'
  };
}

/**
 * Action plan step event.
 */
export interface StepEvent extends BaseProgressEvent {
  type: 'step_started' | 'step_completed' | 'step_skipped' | 'step_failed';
  data: {
    step: number;
    title: string;
    stepType: string;
    tier?: LLMTier;
    reason?: string; // Only for 'skipped' and 'failed'
  };
}

export interface DebugAttemptEvent extends BaseProgressEvent {
  type: 'debug_attempt';
  data: {
    attempt: number;
    maxAttempts: number;
    exitCode: number;
  };
}

export interface FlowCompletedEvent extends BaseProgressEvent {
  type: 'flow_completed';
  data: {
    status: 'success' | 'failed';
    totalDuration: number;
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | FlowStartedEvent
  | PhaseEvent
  | StepEvent
  | DebugAttemptEvent
  | FlowCompletedEvent;

/**
 * Progress callback function.
 */
export type ProgressCallback = (event: ProgressEvent) => void;
