/**
 * Runs the project's test command and captures its output.
 */

import { exec } from 'node:child_process';
import { silentLogger } from '@devcrew/crew-contracts';
import type { Logger, TestConfig } from '@devcrew/crew-contracts';
import { TEST_RUN_CONFIG } from '../config.js';

export interface CommandOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type CommandExecutor = (
  command: string,
  options: { cwd: string; timeoutMs: number }
) => Promise<CommandOutcome>;

export interface TestRunResult {
  exitCode: number;
  passed: boolean;
  /** Formatted report: status header, stdout, stderr */
  output: string;
  timedOut: boolean;
  durationMs: number;
  /** True when there was nothing to run */
  skipped: boolean;
}

export interface TestRunnerConfig {
  repository: string;
  timeoutMs: number;
  execute?: CommandExecutor;
  logger?: Logger;
}

/**
 * Runs `command` through the shell. Never rejects: timeouts and spawn
 * failures are reported through `exitCode`.
 */
export const runShellCommand: CommandExecutor = (command, options) =>
  new Promise((resolve) => {
    exec(
      command,
      { cwd: options.cwd, timeout: options.timeoutMs, maxBuffer: 64 * 1024 * 1024, encoding: 'utf-8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        if (error.killed) {
          resolve({ exitCode: TEST_RUN_CONFIG.timeoutExitCode, stdout, stderr, timedOut: true });
          return;
        }
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr, timedOut: false });
          return;
        }
        if (error.signal) {
          resolve({ exitCode: 1, stdout, stderr: `${stderr}\nTerminated by ${error.signal}`, timedOut: false });
          return;
        }
        resolve({
          exitCode: TEST_RUN_CONFIG.spawnFailureExitCode,
          stdout,
          stderr: stderr || error.message,
          timedOut: false,
        });
      }
    );
  });

export function formatTestOutput(framework: string, outcome: CommandOutcome): string {
  const status = outcome.exitCode === 0 ? 'PASSED' : 'FAILED';
  const header = outcome.timedOut
    ? `[${framework}] Status: ${status} (timed out, exit code: ${outcome.exitCode})\n`
    : `[${framework}] Status: ${status} (exit code: ${outcome.exitCode})\n`;
  const body = `${outcome.stdout}\nStderr:\n${outcome.stderr}`;
  const limit = TEST_RUN_CONFIG.maxOutputChars;
  return header + (body.length > limit ? body.slice(body.length - limit) : body);
}

export class TestRunner {
  private readonly logger: Logger;
  private readonly execute: CommandExecutor;

  constructor(private readonly config: TestRunnerConfig) {
    this.logger = config.logger ?? silentLogger;
    this.execute = config.execute ?? runShellCommand;
  }

  async run(testConfig: TestConfig | null): Promise<TestRunResult> {
    if (!testConfig) {
      return {
        exitCode: 0,
        passed: true,
        output: 'No test configuration, tests skipped\n',
        timedOut: false,
        durationMs: 0,
        skipped: true,
      };
    }

    this.logger.info('Running tests', { command: testConfig.command });
    const startTime = Date.now();
    const outcome = await this.execute(testConfig.command, {
      cwd: this.config.repository,
      timeoutMs: this.config.timeoutMs,
    });
    const durationMs = Date.now() - startTime;

    if (outcome.timedOut) {
      this.logger.warn('Test run timed out', { timeoutMs: this.config.timeoutMs });
    }

    return {
      exitCode: outcome.exitCode,
      passed: outcome.exitCode === 0,
      output: formatTestOutput(testConfig.framework, outcome),
      timedOut: outcome.timedOut,
      durationMs,
      skipped: false,
    };
  }
}
