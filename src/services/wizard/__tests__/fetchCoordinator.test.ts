import { describe, expect, test } from 'vitest';
import type { Stage, WizardEvents } from '../../../domain/contracts';
import { FetchFailedError, FetchInProgressError, FetchTimeoutError } from '../../../domain/errors';
import { IoPool } from '../../pool/ioPool';
import { FetchCoordinator } from '../fetchCoordinator';
import { NotificationBus } from '../notificationBus';
import { deferred, flush } from './fakeLoaderService';

function setup(timeoutMs?: number) {
  const bus = new NotificationBus<WizardEvents>();
  const coordinator = new FetchCoordinator({ bus, pool: new IoPool(2), timeoutMs });
  const lifecycle: string[] = [];
  bus.subscribe('fetch:pending', (stage) => lifecycle.push(`pending:${stage}`));
  bus.subscribe('fetch:settled', (stage) => lifecycle.push(`settled:${stage}`));
  const invalidate = (stage: Stage) => bus.publish('stage:invalidated', stage);
  return { coordinator, lifecycle, invalidate };
}

describe('FetchCoordinator', () => {
  test('commits the result and reports the pending lifecycle', async () => {
    const { coordinator, lifecycle } = setup();
    const committed: number[] = [];

    const outcome = await coordinator.run('SportSelect', async () => 42, (value) => committed.push(value));

    expect(outcome).toEqual({ status: 'committed', value: 42 });
    expect(committed).toEqual([42]);
    expect(lifecycle).toEqual(['pending:SportSelect', 'settled:SportSelect']);
    expect(coordinator.pendingStage()).toBeNull();
  });

  test('rejects a second run for a stage that is in flight', async () => {
    const { coordinator } = setup();
    const gate = deferred<string>();

    const first = coordinator.run('FilterSelect', () => gate.promise, () => undefined);

    expect(coordinator.isPending('FilterSelect')).toBe(true);
    await expect(coordinator.run('FilterSelect', async () => 'again', () => undefined)).rejects.toBeInstanceOf(
      FetchInProgressError,
    );

    gate.resolve('first');
    await expect(first).resolves.toEqual({ status: 'committed', value: 'first' });
  });

  test('other stages may run at the same time', async () => {
    const { coordinator } = setup();
    const gate = deferred<number>();

    const sport = coordinator.run('SportSelect', () => gate.promise, () => undefined);
    const exported = await coordinator.run('Export', async () => 1, () => undefined);

    expect(exported.status).toBe('committed');
    gate.resolve(0);
    await sport;
  });

  test('drops a result that lands after the stage was invalidated', async () => {
    const { coordinator, lifecycle, invalidate } = setup();
    const gate = deferred<string>();
    const committed: string[] = [];

    const pending = coordinator.run('SportSelect', () => gate.promise, (value) => committed.push(value));
    await flush();
    invalidate('SportSelect');

    expect(coordinator.pendingStage()).toBeNull();
    expect(coordinator.generation('SportSelect')).toBe(1);

    gate.resolve('late');
    await expect(pending).resolves.toEqual({ status: 'discarded' });
    expect(committed).toEqual([]);
    expect(lifecycle).toEqual(['pending:SportSelect', 'settled:SportSelect']);
  });

  test('a failure after invalidation is discarded too', async () => {
    const { coordinator, invalidate } = setup();
    const gate = deferred<string>();

    const pending = coordinator.run('ExtractionConfig', () => gate.promise, () => undefined);
    await flush();
    invalidate('ExtractionConfig');
    gate.reject(new Error('late failure'));

    await expect(pending).resolves.toEqual({ status: 'discarded' });
  });

  test('a current failure is wrapped with the stage', async () => {
    const { coordinator } = setup();

    const attempt = coordinator.run(
      'FilterSelect',
      async () => {
        throw new Error('bad gateway');
      },
      () => undefined,
    );

    await expect(attempt).rejects.toThrow('Fetch for FilterSelect failed: bad gateway');
    expect(coordinator.isPending('FilterSelect')).toBe(false);
  });

  test('the flight is released even when commit throws', async () => {
    const { coordinator } = setup();

    const attempt = coordinator.run(
      'SportSelect',
      async () => 1,
      () => {
        throw new Error('commit failed');
      },
    );

    await expect(attempt).rejects.toThrow('commit failed');
    expect(coordinator.isPending('SportSelect')).toBe(false);
  });

  test('a fetch slower than the timeout fails but keeps its flight until the call settles', async () => {
    const { coordinator, lifecycle } = setup(10);
    const gate = deferred<string>();
    const committed: string[] = [];
    let calls = 0;
    const task = () => {
      calls += 1;
      return gate.promise;
    };

    const error = await coordinator.run('SportSelect', task, (value) => committed.push(value)).then(
      () => null,
      (reason: unknown) => reason,
    );

    expect(error).toBeInstanceOf(FetchFailedError);
    expect(error instanceof FetchFailedError && error.cause).toBeInstanceOf(FetchTimeoutError);
    expect(coordinator.isPending('SportSelect')).toBe(true);
    await expect(coordinator.run('SportSelect', task, () => undefined)).rejects.toBeInstanceOf(FetchInProgressError);
    expect(calls).toBe(1);

    gate.resolve('too late');
    await flush();

    expect(coordinator.isPending('SportSelect')).toBe(false);
    expect(committed).toEqual([]);
    expect(lifecycle).toEqual(['pending:SportSelect', 'settled:SportSelect']);
  });

  test('invalidating a timed-out stage frees it at once', async () => {
    const { coordinator, invalidate } = setup(10);
    const gate = deferred<string>();

    await coordinator.run('FilterSelect', () => gate.promise, () => undefined).catch(() => undefined);
    invalidate('FilterSelect');

    expect(coordinator.isPending('FilterSelect')).toBe(false);
    gate.resolve('late');
  });
});
