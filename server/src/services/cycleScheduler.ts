import cron, { type ScheduledTask } from 'node-cron';
import { targetCycle } from '../cycles';
import { PipelineError, describeError, toError } from '../errors';
import { log, logError } from '../log';
import type { ForecastCycle } from '../types';

export type SchedulerState = 'IDLE' | 'EXTRACTING' | 'AGGREGATING' | 'FAILED';

export type PipelineStage = 'extract' | 'aggregate';

export interface CycleRunResult {
    target: ForecastCycle;
    state: 'IDLE' | 'FAILED';
    rows?: number;
    rankings?: number;
    failedStage?: PipelineStage;
    error?: Error;
    startedAt: Date;
    finishedAt: Date;
}

export interface CycleSchedulerOptions {
    extract: (date: string, cycle: string) => Promise<number>;
    aggregate: (date: string, cycle: string) => Promise<number>;
    cronExpression: string;
    timezone: string;
    runOnStart?: boolean;
    now?: () => Date;
}

/**
 * Drives extract → aggregate for the latest published cycle on a cron timer.
 * A failed run ends in FAILED and the next tick starts over; ticks that fire
 * while a run is in flight are skipped.
 */
export class CycleScheduler {
    private currentState: SchedulerState = 'IDLE';
    private inFlight: Promise<CycleRunResult> | null = null;
    private task: ScheduledTask | null = null;
    private last: CycleRunResult | null = null;
    private readonly now: () => Date;

    constructor(private readonly options: CycleSchedulerOptions) {
        this.now = options.now ?? (() => new Date());
    }

    get state(): SchedulerState {
        return this.currentState;
    }

    get lastResult(): CycleRunResult | null {
        return this.last;
    }

    get running(): boolean {
        return this.inFlight !== null;
    }

    /**
     * Runs both stages once for `target`. Never rejects: the outcome,
     * including the failing stage's error, is in the result.
     */
    run(target: ForecastCycle): Promise<CycleRunResult> {
        if (this.inFlight) return this.inFlight;
        const run = this.execute(target).finally(() => {
            this.inFlight = null;
        });
        this.inFlight = run;
        return run;
    }

    /**
     * Timer callback. Returns null when a run is already in flight.
     */
    async tick(): Promise<CycleRunResult | null> {
        if (this.inFlight) {
            log('[SCHEDULER] Previous run still in progress, skipping tick.');
            return null;
        }
        return this.run(targetCycle(this.now()));
    }

    start(): void {
        if (this.task) return;
        const { cronExpression, timezone } = this.options;
        log(`[SCHEDULER] Starting (${cronExpression}, ${timezone})`);
        this.task = cron.schedule(
            cronExpression,
            () => {
                this.tick().catch(err => logError(`[SCHEDULER] Tick failed: ${describeError(err)}`));
            },
            { timezone }
        );
        if (this.options.runOnStart) {
            this.tick().catch(err => logError(`[SCHEDULER] Initial run failed: ${describeError(err)}`));
        }
    }

    /**
     * Stops the timer and waits for an in-flight run to finish.
     */
    async stop(): Promise<void> {
        if (this.task) {
            this.task.stop();
            this.task = null;
            log('[SCHEDULER] Stopped.');
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    private async execute(target: ForecastCycle): Promise<CycleRunResult> {
        const startedAt = this.now();
        const tag = `[SCHEDULER] ${target.date}/${target.cycle}`;
        let stage: PipelineStage = 'extract';
        const result: Omit<CycleRunResult, 'state' | 'finishedAt'> = { target, startedAt };
        let outcome: CycleRunResult;

        try {
            this.currentState = 'EXTRACTING';
            log(`${tag}: extracting`);
            result.rows = await this.options.extract(target.date, target.cycle);

            stage = 'aggregate';
            this.currentState = 'AGGREGATING';
            log(`${tag}: aggregating`);
            result.rankings = await this.options.aggregate(target.date, target.cycle);

            this.currentState = 'IDLE';
            log(`${tag}: complete (${result.rows} samples, ${result.rankings} countries)`);
            outcome = { ...result, state: 'IDLE', finishedAt: this.now() };
        } catch (e) {
            this.currentState = 'FAILED';
            const error = toError(e);
            const kind = e instanceof PipelineError ? e.kind : 'UnexpectedError';
            logError(`${tag}: ${stage} failed (${kind}): ${describeError(e)}`);
            outcome = { ...result, state: 'FAILED', failedStage: stage, error, finishedAt: this.now() };
        }
        this.last = outcome;
        return outcome;
    }
}
