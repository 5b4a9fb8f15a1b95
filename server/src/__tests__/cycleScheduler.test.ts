import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NoDataFound, SourceUnavailable } from '../errors';
import { setLogger } from '../log';
import { CycleScheduler, type CycleSchedulerOptions } from '../services/cycleScheduler';

const cronMock = vi.hoisted(() => {
    const stopTask = vi.fn();
    const schedule = vi.fn((_expression: string, _callback: () => void, _options?: { timezone?: string }) => ({
        stop: stopTask,
    }));
    return { schedule, stopTask };
});

vi.mock('node-cron', () => ({
    default: { schedule: cronMock.schedule, validate: () => true },
}));

type Stage = CycleSchedulerOptions['extract'];

const deferred = <T>() => {
    let resolve: (value: T) => void = () => {};
    const promise = new Promise<T>(r => {
        resolve = r;
    });
    return { promise, resolve };
};

const createScheduler = (extract: Stage, aggregate: Stage, now = new Date('2025-08-08T03:20:00Z')) =>
    new CycleScheduler({
        extract,
        aggregate,
        cronExpression: '15 0,6,12,18 * * *',
        timezone: 'Etc/UTC',
        now: () => now,
    });

describe('CycleScheduler', () => {
    beforeEach(() => {
        setLogger(() => {});
        cronMock.schedule.mockClear();
        cronMock.stopTask.mockClear();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('runs extraction then aggregation for the target cycle', async () => {
        const calls: string[] = [];
        let scheduler: CycleScheduler | null = null;
        const extract = vi.fn<Stage>(async (date, cycle) => {
            calls.push(`extract ${date}/${cycle} ${scheduler?.state}`);
            return 50;
        });
        const aggregate = vi.fn<Stage>(async (date, cycle) => {
            calls.push(`aggregate ${date}/${cycle} ${scheduler?.state}`);
            return 7;
        });
        scheduler = createScheduler(extract, aggregate);

        const result = await scheduler.tick();

        expect(calls).toEqual(['extract 20250807/18 EXTRACTING', 'aggregate 20250807/18 AGGREGATING']);
        expect(result).toMatchObject({ target: { date: '20250807', cycle: '18' }, state: 'IDLE', rows: 50, rankings: 7 });
        expect(scheduler.state).toBe('IDLE');
        expect(scheduler.lastResult).toBe(result);
    });

    it('never aggregates after a failed extraction', async () => {
        const aggregate = vi.fn<Stage>(async () => 1);
        const scheduler = createScheduler(async () => {
            throw new SourceUnavailable('upstream down');
        }, aggregate);

        const result = await scheduler.run({ date: '20250807', cycle: '12' });

        expect(aggregate).not.toHaveBeenCalled();
        expect(scheduler.state).toBe('FAILED');
        expect(result.state).toBe('FAILED');
        expect(result.failedStage).toBe('extract');
        expect(result.error).toBeInstanceOf(SourceUnavailable);
        expect(result.rows).toBeUndefined();
    });

    it('reports aggregation failures with the rows already extracted', async () => {
        const scheduler = createScheduler(
            async () => 12,
            async () => {
                throw new NoDataFound('nothing');
            }
        );

        const result = await scheduler.run({ date: '20250807', cycle: '12' });

        expect(result).toMatchObject({ state: 'FAILED', failedStage: 'aggregate', rows: 12 });
        expect(result.error).toBeInstanceOf(NoDataFound);
    });

    it('starts over on the next tick after a failure', async () => {
        const extract = vi
            .fn<Stage>()
            .mockRejectedValueOnce(new SourceUnavailable('down'))
            .mockResolvedValueOnce(3);
        const scheduler = createScheduler(extract, async () => 1);

        expect((await scheduler.tick())?.state).toBe('FAILED');
        expect((await scheduler.tick())?.state).toBe('IDLE');
        expect(extract).toHaveBeenCalledTimes(2);
    });

    it('skips ticks while a run is in flight', async () => {
        const gate = deferred<number>();
        const extract = vi.fn<Stage>(() => gate.promise);
        const scheduler = createScheduler(extract, async () => 1);

        const first = scheduler.tick();
        expect(scheduler.running).toBe(true);
        expect(await scheduler.tick()).toBeNull();

        gate.resolve(5);
        expect((await first)?.rows).toBe(5);
        expect(extract).toHaveBeenCalledTimes(1);
        expect(scheduler.running).toBe(false);
    });

    it('schedules ticks with node-cron and waits for the in-flight run on stop', async () => {
        const gate = deferred<number>();
        const extract = vi.fn<Stage>(() => gate.promise);
        const scheduler = createScheduler(extract, async () => 1);

        scheduler.start();
        expect(cronMock.schedule).toHaveBeenCalledWith('15 0,6,12,18 * * *', expect.any(Function), {
            timezone: 'Etc/UTC',
        });

        const [, onTick] = cronMock.schedule.mock.calls[0];
        onTick();
        expect(extract).toHaveBeenCalledWith('20250807', '18');

        let stopped = false;
        const stopping = scheduler.stop().then(() => {
            stopped = true;
        });
        expect(cronMock.stopTask).toHaveBeenCalledTimes(1);
        await Promise.resolve();
        expect(stopped).toBe(false);

        gate.resolve(2);
        await stopping;
        expect(stopped).toBe(true);
        expect(scheduler.lastResult?.state).toBe('IDLE');
    });
});
