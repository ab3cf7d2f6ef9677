/**
 * Phase executors by context
 */

import { Clock, SystemClock } from '../types/clock';
import { CONTEXT_NAMES, ContextName } from '../types/context-name';
import { ResultBag, WorkflowPhase, WorkflowState } from '../types/models';
import { PhaseExecutionOptions, PhaseExecutor } from '../types/phase-executor';

/**
 * Looks up the executor for a context
 */
export interface PhaseExecutorResolver {
  resolve(context: ContextName): PhaseExecutor | undefined;
}

/**
 * Registry of executors keyed by context, with an optional fallback
 */
export class ContextExecutorRegistry implements PhaseExecutorResolver {
  private readonly executors = new Map<ContextName, PhaseExecutor>();

  constructor(private readonly fallback?: PhaseExecutor) {}

  register(context: ContextName, executor: PhaseExecutor): this {
    this.executors.set(context, executor);
    return this;
  }

  unregister(context: ContextName): boolean {
    return this.executors.delete(context);
  }

  has(context: ContextName): boolean {
    return this.executors.has(context);
  }

  resolve(context: ContextName): PhaseExecutor | undefined {
    return this.executors.get(context) ?? this.fallback;
  }

  /**
   * Contexts with a registered executor, in canonical order
   */
  contexts(): ContextName[] {
    return CONTEXT_NAMES.filter((context) => this.executors.has(context));
  }
}

export interface SimulatedExecutorOptions {
  clock?: Clock;
  /** Pretend work takes this long */
  latencyMs?: number;
}

/**
 * Executor for dry runs: produces every declared output of the phase.
 * Rejects with the abort reason once the attempt's signal is aborted.
 */
export class SimulatedPhaseExecutor implements PhaseExecutor {
  private readonly clock: Clock;
  private readonly latencyMs: number;

  constructor(options: SimulatedExecutorOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
    this.latencyMs = options.latencyMs ?? 0;
  }

  async execute(
    phase: Readonly<WorkflowPhase>,
    _inputs?: Readonly<ResultBag>,
    _state?: Readonly<WorkflowState>,
    options?: PhaseExecutionOptions
  ): Promise<ResultBag> {
    await this.simulateWork(options?.signal);

    const results: ResultBag = {};
    for (const output of phase.outputs) {
      results[output] = `${output} from ${phase.name}`;
    }
    results.summary = `${phase.name} completed (simulated)`;
    return results;
  }

  private simulateWork(signal?: AbortSignal): Promise<void> {
    if (!signal) {
      return this.clock.delay(this.latencyMs);
    }
    signal.throwIfAborted();
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      this.clock.delay(this.latencyMs).then(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, reject);
    });
  }
}

/**
 * Registry with a simulated executor for every context
 */
export function createSimulatedRegistry(options: SimulatedExecutorOptions = {}): ContextExecutorRegistry {
  const registry = new ContextExecutorRegistry();
  const executor = new SimulatedPhaseExecutor(options);
  for (const context of CONTEXT_NAMES) {
    registry.register(context, executor);
  }
  return registry;
}
