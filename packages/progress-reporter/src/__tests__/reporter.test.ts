/**
 * Tests for ProgressReporter
 */

import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@devcrew/crew-contracts';
import { ProgressReporter } from '../reporter.js';
import type { ProgressEvent } from '../types.js';

const createMockLogger = () => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}) satisfies Logger;

describe('ProgressReporter', () => {
  describe('Event emission', () => {
    it('should emit flow_started event', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.start('iterate', 'Add caching');

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'flow_started', data: { flow: 'iterate', description: 'Add caching' } });
      expect(logger.info).toHaveBeenCalledWith('🎯 iterate started: Add caching');
    });

    it('should emit phase events with counts on completion', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.phase('planning', 'started');
      reporter.phase('planning', 'completed', { steps: 3 });

      expect(events.map((e) => e.type)).toEqual(['phase_started', 'phase_completed']);
      expect(events[1]).toMatchObject({ data: { phase: 'planning', counts: { steps: 3 } } });
      expect(logger.info).toHaveBeenCalledWith('📋 planning done', { steps: 3 });
    });

    it('should emit step events', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));
      const info = { step: 1, title: 'Add helper', stepType: 'modify_code', tier: 'medium' as const };

      reporter.step(info, 'started');
      reporter.step(info, 'completed');

      expect(events.map((e) => e.type)).toEqual(['step_started', 'step_completed']);
      expect(logger.info).toHaveBeenCalledWith('🟡 [1] Add helper (modify_code)');
      expect(logger.info).toHaveBeenCalledWith('✅ [1] Add helper');
    });

    it('should log failures as errors with the reason', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.step({ step: 2, title: 'Remove module', stepType: 'delete_file' }, 'failed', 'Is a directory');

      expect(events[0]).toMatchObject({ type: 'step_failed', data: { reason: 'Is a directory' } });
      expect(logger.error).toHaveBeenCalledWith('❌ [2] Remove module failed: Is a directory');
    });

    it('should emit debug_attempt event', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.debugAttempt(2, 3, 1);

      expect(events[0]).toMatchObject({ type: 'debug_attempt', data: { attempt: 2, maxAttempts: 3, exitCode: 1 } });
      expect(logger.info).toHaveBeenCalledWith('🐛 Test run 2/3 exited with 1');
    });

    it('should emit flow_completed event', () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.start('new_project', 'Todo app');
      reporter.complete('failed');

      const completeEvent = events.find((e) => e.type === 'flow_completed');
      expect(completeEvent).toMatchObject({ data: { status: 'failed' } });
    });
  });

  describe('Event history', () => {
    it('should store and clear events', () => {
      const reporter = new ProgressReporter(createMockLogger());

      reporter.start('iterate', 'Test');
      reporter.phase('summaries', 'started');

      expect(reporter.getEvents()).toHaveLength(2);

      reporter.clear();

      expect(reporter.getEvents()).toHaveLength(0);
    });

    it('should work without callback', () => {
      const reporter = new ProgressReporter(createMockLogger());

      expect(() => {
        reporter.start('iterate', 'Test');
        reporter.complete('success');
      }).not.toThrow();
    });
  });
});
