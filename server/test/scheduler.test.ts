import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { PipelineKind, RunReport } from '../../ingest/types';
import { HourlyScheduler, msUntilNextSlot } from '../scheduler';

function report(pipeline: PipelineKind): RunReport {
    return {
        pipeline,
        runAt: new Date().toISOString(),
        status: 'SUCCESS',
        phases: ['START', 'FETCHING', 'NORMALIZING', 'WRITING', 'SUCCESS'],
        artifacts: [],
        failures: [],
        skipped: [],
        durationMs: 0
    };
}

describe('msUntilNextSlot', () => {

    it('waits for the configured minute past the hour', () => {
        expect(msUntilNextSlot(Date.parse('2024-03-01T13:30:00Z'), 0)).toBe(30 * 60_000);
        expect(msUntilNextSlot(Date.parse('2024-03-01T13:50:00Z'), 55)).toBe(5 * 60_000);
        expect(msUntilNextSlot(Date.parse('2024-03-01T13:56:00Z'), 55)).toBe(59 * 60_000);
    });

    it('schedules a full hour ahead when exactly on the slot', () => {
        expect(msUntilNextSlot(Date.parse('2024-03-01T14:00:00Z'), 0)).toBe(60 * 60_000);
    });
});

describe('HourlyScheduler', () => {

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-03-01T13:59:00Z'));
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('runs every enabled pipeline at the top of the hour', async () => {
        const run = vi.fn(async (pipeline: PipelineKind, _runAt: Date) => report(pipeline));
        const scheduler = new HourlyScheduler({ minute: 0, pipelines: ['batched', 'per-call'], run });

        scheduler.start();
        expect(run).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(60_000);
        expect(run.mock.calls.map(([pipeline, runAt]) => [pipeline, runAt.toISOString()])).toEqual([
            ['batched', '2024-03-01T14:00:00.000Z'],
            ['per-call', '2024-03-01T14:00:00.000Z']
        ]);

        await vi.advanceTimersByTimeAsync(60 * 60_000);
        expect(run).toHaveBeenCalledTimes(4);
        expect(run.mock.calls[3][1].toISOString()).toBe('2024-03-01T15:00:00.000Z');
        scheduler.stop();
    });

    it('runs immediately when asked to', async () => {
        const run = vi.fn(async (pipeline: PipelineKind, _runAt: Date) => report(pipeline));
        const scheduler = new HourlyScheduler({ minute: 0, pipelines: ['batched'], run, runOnStartup: true });

        scheduler.start();
        await vi.advanceTimersByTimeAsync(0);
        expect(run).toHaveBeenCalledTimes(1);
        expect(run.mock.calls[0][1].toISOString()).toBe('2024-03-01T13:59:00.000Z');
        scheduler.stop();
    });

    it('logs a thrown run and keeps going', async () => {
        const run = vi.fn(async (pipeline: PipelineKind, _runAt: Date) => {
            if (pipeline === 'batched') throw new Error('boom');
            return report(pipeline);
        });
        const scheduler = new HourlyScheduler({ minute: 0, pipelines: ['batched', 'per-call'], run });

        await expect(scheduler.tick()).resolves.toBeUndefined();
        expect(run).toHaveBeenCalledTimes(2);
        expect(console.error).toHaveBeenCalledWith('[scheduler] run threw', {
            pipeline: 'batched',
            runAt: '2024-03-01T13:59:00.000Z',
            error: 'boom'
        });
    });

    it('still fires the next slot while an earlier run is in progress', async () => {
        vi.setSystemTime(new Date('2024-03-01T13:59:50Z'));
        const run = vi.fn((pipeline: PipelineKind, _runAt: Date) => new Promise<RunReport>((resolve) => {
            setTimeout(() => resolve(report(pipeline)), 30_000);
        }));
        const scheduler = new HourlyScheduler({ minute: 0, pipelines: ['batched'], run, runOnStartup: true });

        scheduler.start();
        await vi.advanceTimersByTimeAsync(120_000);
        scheduler.stop();

        expect(run.mock.calls.map(([, runAt]) => runAt.toISOString())).toEqual([
            '2024-03-01T13:59:50.000Z',
            '2024-03-01T14:00:00.000Z'
        ]);
    });

    it('gives every pipeline the slot instant, however long another takes', async () => {
        const finished: string[] = [];
        const run = vi.fn((pipeline: PipelineKind, _runAt: Date) => new Promise<RunReport>((resolve) => {
            setTimeout(() => {
                finished.push(pipeline);
                resolve(report(pipeline));
            }, pipeline === 'batched' ? 90_000 : 1_000);
        }));
        const scheduler = new HourlyScheduler({ minute: 0, pipelines: ['batched', 'per-call'], run });

        scheduler.start();
        await vi.advanceTimersByTimeAsync(60_000);
        expect(run.mock.calls.map(([pipeline, runAt]) => [pipeline, runAt.toISOString()])).toEqual([
            ['batched', '2024-03-01T14:00:00.000Z'],
            ['per-call', '2024-03-01T14:00:00.000Z']
        ]);

        await vi.advanceTimersByTimeAsync(1_000);
        expect(finished).toEqual(['per-call']);

        await vi.advanceTimersByTimeAsync(90_000);
        expect(finished).toEqual(['per-call', 'batched']);
        scheduler.stop();
    });

    it('stops firing after stop()', async () => {
        const run = vi.fn(async (pipeline: PipelineKind, _runAt: Date) => report(pipeline));
        const scheduler = new HourlyScheduler({ minute: 0, pipelines: ['batched'], run });

        scheduler.start();
        expect(scheduler.started).toBe(true);
        scheduler.stop();
        await vi.advanceTimersByTimeAsync(2 * 60 * 60_000);
        expect(run).not.toHaveBeenCalled();
    });
});
