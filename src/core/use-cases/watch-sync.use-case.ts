import type { SyncOptions } from "../domain/entities/config.entity.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { IReporter } from "../domain/services/reporter.service.js";
import { FilterChain } from "../domain/services/filter-chain.service.js";
import { WatchCycleError, errorMessage } from "../domain/errors.js";
import type { SyncCycleResult } from "./sync-trees.use-case.js";

export type WatchState = "idle" | "running";

/** Everything one watch loop needs; owned by that loop alone. */
export interface WatchContext {
  source: string;
  destination: string;
  options: SyncOptions;
  intervalMs: number;
  signal: AbortSignal;
}

export interface WatchCycleOutcome {
  cycle: number;
  result?: SyncCycleResult;
  error?: WatchCycleError;
}

export interface CycleRunner {
  execute(options: SyncOptions, cycle: number): Promise<SyncCycleResult>;
}

export interface WatchHooks {
  onStateChange?: (state: WatchState, cycle: number) => void;
  onCycle?: (outcome: WatchCycleOutcome) => void;
}

/** Resolves after `ms`, or as soon as the signal aborts. Never rejects. */
export function interruptibleSleep(
  ms: number,
  signal: AbortSignal,
): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Runs a cycle right away, then again after every interval until the signal
 * aborts. The signal is only looked at between cycles: a running cycle is
 * allowed to finish. Cycle failures are reported and the loop carries on;
 * an invalid configuration stops it before the first cycle.
 */
export class WatchSyncUseCase {
  private state: WatchState = "idle";

  constructor(
    private runner: CycleRunner,
    private reporter: IReporter,
    private logger: ILogger,
    private hooks: WatchHooks = {},
    private sleep: (ms: number, signal: AbortSignal) => Promise<void> = interruptibleSleep,
  ) {}

  get currentState(): WatchState {
    return this.state;
  }

  async run(context: WatchContext): Promise<WatchCycleOutcome | undefined> {
    // Throws ConfigurationError before anything is listed.
    FilterChain.fromOptions(context.options);

    let latest: WatchCycleOutcome | undefined;
    let cycle = 0;
    this.reporter.info(
      `Watching ${context.source} -> ${context.destination} every ${context.intervalMs / 1000}s`,
    );

    while (!context.signal.aborted) {
      cycle++;
      this.transition("running", cycle);
      let outcome: WatchCycleOutcome;
      try {
        const result = await this.runner.execute(context.options, cycle);
        outcome = { cycle, result };
      } catch (e) {
        const error = new WatchCycleError(
          `Cycle ${cycle} failed: ${errorMessage(e)}`,
          cycle,
          { cause: e },
        );
        this.logger.log({
          event: "cycle-error",
          cycle,
          source: context.source,
          destination: context.destination,
          success: false,
          errorMessage: errorMessage(e),
        });
        this.reporter.error(error.message);
        outcome = { cycle, error };
      }
      latest = outcome;
      this.transition("idle", cycle);
      this.hooks.onCycle?.(outcome);

      if (context.signal.aborted) break;
      await this.sleep(context.intervalMs, context.signal);
    }

    this.reporter.info(`Watch stopped after ${cycle} cycle(s)`);
    return latest;
  }

  private transition(next: WatchState, cycle: number): void {
    this.state = next;
    this.hooks.onStateChange?.(next, cycle);
  }
}
