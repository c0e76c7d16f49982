/**
 * Weather Ingest — Run Tracker
 *
 * Records the phase sequence of one pipeline run and assembles its report.
 */

import { describeError, isIngestError } from '../errors';
import type { ArtifactRef, PipelineKind, RunPhase, RunReport, RunStatus, UnitFailure } from '../types';

const TRANSITIONS: Record<RunPhase, readonly RunPhase[]> = {
    START: ['FETCHING', 'TOTAL_FAILURE'],
    FETCHING: ['NORMALIZING', 'TOTAL_FAILURE'],
    NORMALIZING: ['WRITING', 'TOTAL_FAILURE'],
    WRITING: ['SUCCESS', 'PARTIAL_FAILURE', 'TOTAL_FAILURE'],
    SUCCESS: [],
    PARTIAL_FAILURE: [],
    TOTAL_FAILURE: []
};

const TERMINAL = new Set<RunPhase>(['SUCCESS', 'PARTIAL_FAILURE', 'TOTAL_FAILURE']);

export function toUnitFailure(scope: string, error: unknown): UnitFailure {
    return {
        scope,
        kind: isIngestError(error) ? error.kind : 'unexpected',
        message: describeError(error)
    };
}

export class RunTracker {
    readonly phases: RunPhase[] = ['START'];
    readonly artifacts: ArtifactRef[] = [];
    readonly failures: UnitFailure[] = [];
    readonly skipped: string[] = [];
    private readonly startedMs: number;

    constructor(
        readonly pipeline: PipelineKind,
        readonly runAt: Date,
        private readonly now: () => number = Date.now
    ) {
        this.startedMs = now();
    }

    get phase(): RunPhase {
        return this.phases[this.phases.length - 1];
    }

    get finished(): boolean {
        return TERMINAL.has(this.phase);
    }

    /** Advance to `next`. Throws on a transition the state machine does not allow. */
    advance(next: RunPhase): void {
        if (!TRANSITIONS[this.phase].includes(next)) {
            throw new Error(`Illegal run transition ${this.phase} -> ${next}`);
        }
        this.phases.push(next);
    }

    fail(scope: string, error: unknown): UnitFailure {
        const failure = toUnitFailure(scope, error);
        this.failures.push(failure);
        return failure;
    }

    /** Terminal state for a run with independent units. */
    settleUnits(succeeded: number): RunStatus {
        const failed = this.failures.length + this.skipped.length;
        const status: RunStatus = succeeded === 0 ? 'TOTAL_FAILURE' : failed === 0 ? 'SUCCESS' : 'PARTIAL_FAILURE';
        this.advance(status);
        return status;
    }

    /** Jump to TOTAL_FAILURE from wherever the run is. */
    abort(): void {
        if (!this.finished) this.advance('TOTAL_FAILURE');
    }

    report(): RunReport {
        const last = this.phase;
        const status: RunStatus = last === 'SUCCESS' || last === 'PARTIAL_FAILURE' ? last : 'TOTAL_FAILURE';
        return {
            pipeline: this.pipeline,
            runAt: this.runAt.toISOString(),
            status,
            phases: [...this.phases],
            artifacts: [...this.artifacts],
            failures: [...this.failures],
            skipped: [...this.skipped],
            durationMs: Math.max(0, this.now() - this.startedMs)
        };
    }
}
