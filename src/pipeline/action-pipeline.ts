/**
 * Action Pipeline
 *
 * Runs one wallet's units in order. A failed unit is recorded and the run
 * moves on, also when its precondition or an attempt timed out; only units
 * whose `requires` names a failed kind are skipped.
 * Consecutive attempted units are separated by a random pause. An operator
 * stop lets the in-flight unit finish and skips the rest as cancelled.
 */

import { Bounds } from '../config';
import { Clock } from '../utils/clock';
import { ActionFailure, toError } from '../utils/errors';
import { RandomSource, randomInt } from '../utils/random';
import { withRetryAndTimeout, withTimeout } from '../utils/retry';
import { ActionContext, ActionUnit, PipelineResult, UnitOutcome, UnitStatus } from './types';

export interface ActionPipelineOptions {
  clock: Clock;
  random: RandomSource;
  /** Seconds between consecutive units, inclusive */
  pacing: Bounds;
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs?: number;
  /**
   * Called after a unit fails, before the next one starts. The wallet runner
   * swaps a dead proxy here.
   */
  onUnitFailure?: (unit: ActionUnit, error: ActionFailure, ctx: ActionContext) => Promise<void>;
}

export class ActionPipeline {
  constructor(private readonly options: ActionPipelineOptions) {}

  async run(ctx: ActionContext, units: readonly ActionUnit[], stopSignal?: AbortSignal): Promise<PipelineResult> {
    const { clock } = this.options;
    const outcomes: UnitOutcome[] = [];
    const failedKinds = new Set<string>();
    let attemptedAny = false;
    let cancelled = false;

    const record = (unit: ActionUnit, status: UnitStatus, message: string, attempts: number, startedAt: number) => {
      outcomes.push({
        kind: unit.kind,
        name: unit.name,
        status,
        message,
        attempts,
        durationMs: clock.now() - startedAt,
      });
    };

    for (const unit of units) {
      if (stopSignal?.aborted) {
        cancelled = true;
        record(unit, 'skipped', 'cancelled', 0, clock.now());
        continue;
      }

      const missing = unit.requires?.find((kind) => failedKinds.has(kind));
      if (missing) {
        ctx.log.warn(`${ctx.wallet.tag} ${unit.name} | Skipped: ${missing} failed earlier`);
        record(unit, 'skipped', `requires ${missing}`, 0, clock.now());
        continue;
      }

      if (attemptedAny) {
        const pauseSeconds = randomInt(this.options.random, this.options.pacing.min, this.options.pacing.max);
        ctx.log.debug(`${ctx.wallet.tag} Sleeping ${pauseSeconds}s before ${unit.name}`);
        await clock.sleep(pauseSeconds * 1000, stopSignal);
        if (stopSignal?.aborted) {
          cancelled = true;
          record(unit, 'skipped', 'cancelled', 0, clock.now());
          continue;
        }
      }

      const startedAt = clock.now();
      let attempts = 0;

      try {
        const { precondition } = unit;
        const reason = precondition
          ? await withTimeout((signal) => precondition.call(unit, ctx, signal), this.options.timeoutMs)
          : null;
        if (reason) {
          ctx.log.info(`${ctx.wallet.tag} ${unit.name} | Skipped: ${reason}`);
          record(unit, 'skipped', reason, 0, startedAt);
          continue;
        }

        attemptedAny = true;
        const { value } = await withRetryAndTimeout(
          unit.name,
          (signal, attempt) => {
            attempts = attempt;
            return unit.execute(ctx, signal);
          },
          this.options.timeoutMs,
          {
            maxRetries: this.options.retries,
            ...(this.options.retryBaseDelayMs !== undefined ? { baseDelayMs: this.options.retryBaseDelayMs } : {}),
          },
          {
            clock,
            onRetry: (attempt, error, delayMs) =>
              ctx.log.warn(`${ctx.wallet.tag} ${unit.name} | Attempt ${attempt} failed, retrying in ${delayMs}ms`, {
                error: error.message,
              }),
          }
        );

        ctx.log.info(`${ctx.wallet.tag} ${value}`);
        record(unit, 'success', value, attempts, startedAt);
      } catch (error) {
        attemptedAny = true;
        const failure = error instanceof ActionFailure ? error : new ActionFailure(unit.name, toError(error).message, toError(error));
        failedKinds.add(unit.kind);
        ctx.log.error(`${ctx.wallet.tag} ${failure.message}`);
        record(unit, 'failed', failure.message, attempts, startedAt);

        if (this.options.onUnitFailure) {
          await this.options.onUnitFailure(unit, failure, ctx);
        }
      }
    }

    return { outcomes, cancelled };
  }
}
