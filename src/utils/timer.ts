/**
 * Pipeline Timer Utility
 * Tracks execution time of the steps of one collage render
 */

import { createChildLogger } from './logger.js';

const logger = createChildLogger({ service: 'timer' });

export interface StepTiming {
  step: string;
  durationMs: number;
  durationFormatted: string;
  failed: boolean;
}

export interface PipelineSummary {
  sessionId: string;
  totalDurationMs: number;
  totalDurationFormatted: string;
  steps: StepTiming[];
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

export class PipelineTimer {
  private readonly started: number;
  private readonly steps: StepTiming[] = [];

  constructor(
    private readonly sessionId: string,
    private readonly logPrefix = '[TIMER]'
  ) {
    this.started = Date.now();
  }

  /**
   * Run one step and record how long it took, whether or not it threw
   */
  async time<T>(step: string, operation: () => Promise<T>): Promise<T> {
    const start = Date.now();
    let failed = true;
    try {
      const result = await operation();
      failed = false;
      return result;
    } finally {
      const durationMs = Date.now() - start;
      this.steps.push({ step, durationMs, durationFormatted: formatDuration(durationMs), failed });
      logger.debug(
        { sessionId: this.sessionId, step, durationMs, failed },
        `${this.logPrefix} ${step}: ${formatDuration(durationMs)}`
      );
    }
  }

  getSummary(): PipelineSummary {
    const totalDurationMs = Date.now() - this.started;
    return {
      sessionId: this.sessionId,
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      steps: [...this.steps],
    };
  }

  logSummary(): void {
    const summary = this.getSummary();
    const breakdown = summary.steps.map((s) => `${s.step}: ${s.durationFormatted}`).join(' | ');

    logger.info(
      { sessionId: this.sessionId, totalDurationMs: summary.totalDurationMs, steps: summary.steps },
      `${this.logPrefix} Render finished in ${summary.totalDurationFormatted} (${breakdown})`
    );
  }
}
