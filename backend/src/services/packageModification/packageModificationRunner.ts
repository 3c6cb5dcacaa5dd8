/** Runs package steps in order and broadcasts their progress. */

import { randomUUID } from 'node:crypto';
import type { ModificationEvent } from '../../models/events.js';
import type { PackageStep } from './packageStep.js';
import { Logger, errorMessage } from '../../utils/logger.js';

export interface ModificationResult {
  runnerId: string;
  failed: boolean;
  completedSteps: number;
  errors: string[];
}

export interface PackageModificationRunnerOptions {
  packageId: string;
  send: (event: ModificationEvent) => void;
  logger?: Logger;
}

export class PackageModificationRunner {
  readonly id = randomUUID();
  private readonly logger: Logger;

  constructor(private readonly options: PackageModificationRunnerOptions) {
    this.logger = (options.logger ?? Logger.create()).child('PackageModification');
  }

  /**
   * Execute steps sequentially. The first failure stops the run; an aborted
   * signal stops it before the next step starts.
   */
  async executeSteps(steps: readonly PackageStep[], signal: AbortSignal): Promise<ModificationResult> {
    const { send, packageId } = this.options;
    const runnerId = this.id;
    const errors: string[] = [];
    let completedSteps = 0;

    send({ type: 'modification_started', runner_id: runnerId, package_id: packageId, total_steps: steps.length });
    this.logger.info('Modification started', { runnerId, packageId, steps: steps.length });

    for (const [index, step] of steps.entries()) {
      if (signal.aborted) {
        errors.push('Canceled');
        this.logger.info('Modification canceled', { runnerId, remaining: steps.length - index });
        break;
      }

      send({
        type: 'modification_progress',
        runner_id: runnerId,
        step_index: index,
        title: step.progressTitle,
        message: '',
        progress: null,
      });

      try {
        await step.execute((progress) => {
          send({
            type: 'modification_progress',
            runner_id: runnerId,
            step_index: index,
            title: step.progressTitle,
            message: progress.message,
            progress: progress.value,
          });
        }, signal);
        completedSteps++;
      } catch (err) {
        const message = errorMessage(err);
        errors.push(message);
        this.logger.error('Step failed', { runnerId, step: step.progressTitle, error: message });
        send({
          type: 'modification_step_failed',
          runner_id: runnerId,
          step_index: index,
          title: step.progressTitle,
          error: message,
        });
        break;
      }
    }

    const failed = errors.length > 0;
    send({
      type: 'modification_completed',
      runner_id: runnerId,
      failed,
      completed_steps: completedSteps,
      total_steps: steps.length,
    });
    this.logger.info('Modification finished', { runnerId, failed, completedSteps });
    return { runnerId, failed, completedSteps, errors };
  }
}
