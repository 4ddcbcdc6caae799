/**
 * @module @devcrew/progress-reporter/reporter
 * Progress reporter for devcrew pipelines.
 *
 * UX-only component - events never influence pipeline decisions.
 */

import type { Logger, LLMTier } from '@devcrew/crew-contracts';
import type { FlowKind, ProgressEvent, ProgressCallback, StepEvent } from './types.js';

type StepPhase = 'started' | 'completed' | 'skipped' | 'failed';

export interface StepInfo {
  step: number;
  title: string;
  stepType: string;
  tier?: LLMTier;
}

/**
 * Progress reporter - emits UX-only progress events.
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter(logger, (event) => {
 *   socket.send(JSON.stringify(event));
 * });
 *
 * reporter.start('iterate', 'Add a --verbose flag');
 * reporter.phase('planning', 'started');
 * reporter.phase('planning', 'completed', { steps: 3 });
 * reporter.step({ step: 1, title: 'Add flag', stepType: 'modify_code', tier: 'small' }, 'started');
 * reporter.complete('success');
 * ```
 */
export class ProgressReporter {
  private events: ProgressEvent[] = [];
  private startTime: number = 0;

  constructor(
    private logger: Logger,
    private onProgress?: ProgressCallback
  ) {}

  /**
   * Start tracking a pipeline run.
   */
  start(flow: FlowKind, description: string): void {
    this.startTime = Date.now();
    this.emit({
      type: 'flow_started',
      timestamp: this.startTime,
      data: { flow, description },
    });
    this.logger.info(`🎯 ${flow} started: ${description}`);
  }

  /**
   * Report a pipeline phase boundary.
   */
  phase(name: string, status: 'started' | 'completed', counts?: Record<string, number>): void {
    this.emit({
      type: status === 'started' ? 'phase_started' : 'phase_completed',
      timestamp: Date.now(),
      data: counts ? { phase: name, counts } : { phase: name },
    });

    if (status === 'started') {
      this.logger.info(`📋 ${name}...`);
    } else {
      this.logger.info(`📋 ${name} done`, counts ?? {});
    }
  }

  /**
   * Report action plan step status.
   */
  step(info: StepInfo, phase: StepPhase, reason?: string): void {
    const event: StepEvent = {
      type: `step_${phase}`,
      timestamp: Date.now(),
      data: reason === undefined ? { ...info } : { ...info, reason },
    };
    this.emit(event);

    const label = `[${info.step}] ${info.title}`;
    switch (phase) {
      case 'started':
        this.logger.info(`${info.tier ? this.getTierEmoji(info.tier) : '▶️'} ${label} (${info.stepType})`);
        break;
      case 'completed':
        this.logger.info(`✅ ${label}`);
        break;
      case 'skipped':
        this.logger.info(`⏭️  ${label} skipped: ${reason ?? 'nothing to do'}`);
        break;
      case 'failed':
        this.logger.error(`❌ ${label} failed: ${reason ?? 'Unknown error'}`);
        break;
    }
  }

  /**
   * Report a debug loop test execution.
   */
  debugAttempt(attempt: number, maxAttempts: number, exitCode: number): void {
    this.emit({
      type: 'debug_attempt',
      timestamp: Date.now(),
      data: { attempt, maxAttempts, exitCode },
    });
    const emoji = exitCode === 0 ? '✅' : '🐛';
    this.logger.info(`${emoji} Test run ${attempt}/${maxAttempts} exited with ${exitCode}`);
  }

  /**
   * Report pipeline completion.
   */
  complete(status: 'success' | 'failed'): void {
    const totalDuration = Date.now() - this.startTime;
    const emoji = status === 'success' ? '✅' : '❌';

    this.emit({
      type: 'flow_completed',
      timestamp: Date.now(),
      data: { status, totalDuration },
    });

    this.logger.info(`${emoji} Run ${status} in ${(totalDuration / 1000).toFixed(1)}s`);
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  /**
   * Clear all events.
   */
  clear(): void {
    this.events = [];
    this.startTime = 0;
  }

  private emit(event: ProgressEvent): void {
    this.events.push(event);
    if (this.onProgress) {
      this.onProgress(event);
    }
  }

  private getTierEmoji(tier: LLMTier): string {
    switch (tier) {
      case 'small':
        return '🟢';
      case 'medium':
        return '🟡';
      case 'large':
        return '🔴';
    }
  }
}
