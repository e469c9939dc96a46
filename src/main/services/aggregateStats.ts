/**
 * Running totals of finished jobs.
 *
 * recordTerminal() is the only way the terminal counters change, and it is
 * called exactly once per job, so completed + failed always equals the
 * number of jobs that have reached a terminal state.
 */

import { AggregateStatsSnapshot, JobOutcome } from '../../shared/types';

export class AggregateStats {
  private completed = 0;
  private failed = 0;
  private usbCopied = 0;

  recordTerminal(outcome: JobOutcome): void {
    if (outcome.state === 'completed') {
      this.completed++;
    } else {
      this.failed++;
    }
    if (outcome.usbCopied) {
      this.usbCopied++;
    }
  }

  /**
   * Snapshot of all counters. Queued and running come from the orchestrator,
   * which owns the queue and the running set.
   */
  snapshot(queued: number, running: number): AggregateStatsSnapshot {
    return {
      queued,
      running,
      completed: this.completed,
      failed: this.failed,
      usbCopied: this.usbCopied,
    };
  }
}
