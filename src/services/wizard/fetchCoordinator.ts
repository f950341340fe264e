import { STAGES } from '../../domain/contracts';
import type { Stage, WizardEvents } from '../../domain/contracts';
import { FetchFailedError, FetchInProgressError, FetchTimeoutError } from '../../domain/errors';
import { type Logger, silentLogger } from '../logging/logger';
import type { IoPool } from '../pool/ioPool';
import type { NotificationBus } from './notificationBus';

export type FetchOutcome<T> = { status: 'committed'; value: T } | { status: 'discarded' };

export interface FetchCoordinatorConfig {
  bus: NotificationBus<WizardEvents>;
  pool: IoPool;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Runs the slow collaborator calls of each stage on the shared pool.
 *
 * One flight per stage: a second `run` for a stage that is still in flight
 * throws `FetchInProgressError`. Every `stage:invalidated` event bumps that
 * stage's generation and detaches its flight, so a result that lands after
 * an invalidation is dropped without calling `commit`. A call that times out
 * fails at once but keeps its flight until it settles.
 */
export class FetchCoordinator {
  private readonly generations = new Map<Stage, number>();
  private readonly flights = new Map<Stage, number>();
  private flightSeq = 0;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(private readonly config: FetchCoordinatorConfig) {
    this.logger = config.logger ?? silentLogger;
    this.timeoutMs = config.timeoutMs ?? 0;
    config.bus.subscribe('stage:invalidated', (stage) => this.invalidate(stage));
  }

  isPending(stage: Stage): boolean {
    return this.flights.has(stage);
  }

  pendingStage(): Stage | null {
    return STAGES.find((stage) => this.flights.has(stage)) ?? null;
  }

  generation(stage: Stage): number {
    return this.generations.get(stage) ?? 0;
  }

  invalidate(stage: Stage): void {
    this.generations.set(stage, this.generation(stage) + 1);
    if (this.flights.delete(stage)) {
      this.logger.info(`Detached in-flight fetch for ${stage}`);
      this.config.bus.publish('fetch:settled', stage);
    }
  }

  async run<T>(stage: Stage, task: () => Promise<T>, commit: (value: T) => void): Promise<FetchOutcome<T>> {
    if (this.flights.has(stage)) {
      throw new FetchInProgressError(stage);
    }

    const flightId = ++this.flightSeq;
    const generation = this.generation(stage);
    this.flights.set(stage, flightId);
    this.config.bus.publish('fetch:pending', stage);
    this.logger.debug(`Fetch ${flightId} started for ${stage} (generation ${generation})`);

    const running = this.config.pool.run(task);
    let value: T;
    try {
      value = await this.withTimeout(running);
    } catch (error) {
      const stale = this.generation(stage) !== generation;
      if (error instanceof FetchTimeoutError && !stale) {
        this.releaseWhenSettled(stage, flightId, running);
      } else {
        this.release(stage, flightId);
      }
      if (stale) {
        this.logger.debug(`Discarded failed fetch ${flightId} for ${stage}`);
        return { status: 'discarded' };
      }
      this.logger.warn(`Fetch for ${stage} failed`, error);
      throw new FetchFailedError(stage, error);
    }

    if (this.generation(stage) !== generation) {
      this.release(stage, flightId);
      this.logger.debug(`Discarded stale fetch ${flightId} for ${stage}`);
      return { status: 'discarded' };
    }

    try {
      commit(value);
    } finally {
      this.release(stage, flightId);
    }
    return { status: 'committed', value };
  }

  private release(stage: Stage, flightId: number): void {
    if (this.flights.get(stage) !== flightId) {
      return;
    }
    this.flights.delete(stage);
    this.config.bus.publish('fetch:settled', stage);
  }

  /** A timed-out call keeps its flight until the collaborator answers or the stage is invalidated. */
  private releaseWhenSettled(stage: Stage, flightId: number, running: Promise<unknown>): void {
    this.logger.debug(`Fetch ${flightId} for ${stage} timed out; holding the flight until the call settles`);
    void running.then(
      () => this.release(stage, flightId),
      () => this.release(stage, flightId),
    );
  }

  private withTimeout<T>(running: Promise<T>): Promise<T> {
    if (this.timeoutMs <= 0) {
      return running;
    }

    const timeoutMs = this.timeoutMs;
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new FetchTimeoutError(timeoutMs)), timeoutMs);
      void running.then(resolve, reject).finally(() => clearTimeout(timer));
    });
  }
}
