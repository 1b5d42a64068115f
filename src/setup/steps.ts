import { zone } from '../logging/zone';
import { ManagementApiError } from '../api/http';
import { StepName, StepOutcome, StepRecord } from '../types/setup';

const log = zone('setup.steps');

const CONFLICT = 409;

/**
 * Thrown when a step's outcome is fatal; carries every step recorded so far
 */
export class SetupAbortedError extends Error {
    readonly step: StepName;
    readonly steps: StepRecord[];

    constructor(step: StepName, reason: string, steps: StepRecord[]) {
        super(`Setup aborted at ${step}: ${reason}`);
        this.name = 'SetupAbortedError';
        this.step = step;
        this.steps = steps;
    }
}

export function ok<T>(value: T): StepOutcome<T> {
    return { status: 'ok', value };
}

/**
 * Run a management call and turn ManagementApiError into a recoverable
 * outcome. Any other error propagates.
 */
export async function attempt<T>(call: () => Promise<T>): Promise<StepOutcome<T>> {
    try {
        return ok(await call());
    } catch (err) {
        if (!(err instanceof ManagementApiError)) {
            throw err;
        }
        if (err.isConflict) {
            log.warn({ message: `${err.operation}: resource already exists`, data: { body: err.body } });
        } else {
            log.error({ message: err.message, data: { operation: err.operation, status: err.status, body: err.body } });
        }
        return { status: 'recoverable', reason: err.message, httpStatus: err.status };
    }
}

/**
 * Ordered record of step outcomes for one run.
 * Fatal outcomes (and recoverable ones under failFast) throw SetupAbortedError.
 */
export class StepRecorder {
    private readonly records: StepRecord[] = [];
    private readonly outcomes = new Map<StepName, StepOutcome<unknown>>();

    constructor(private readonly failFast = false) { }

    get steps(): StepRecord[] {
        return [...this.records];
    }

    record<T>(step: StepName, outcome: StepOutcome<T>): StepOutcome<T> {
        this.outcomes.set(step, outcome);

        const entry: StepRecord = { step, status: outcome.status };
        if (outcome.status !== 'ok') {
            entry.reason = outcome.reason;
        }
        if (outcome.status === 'recoverable' && outcome.httpStatus !== undefined) {
            entry.httpStatus = outcome.httpStatus;
        }
        this.records.push(entry);

        switch (outcome.status) {
            case 'ok':
                log.debug({ message: 'Step succeeded', data: { step } });
                break;
            case 'skipped':
                log.warn({ message: 'Step skipped', data: { step, reason: outcome.reason } });
                break;
            case 'recoverable':
                log.warn({ message: 'Step failed, continuing', data: { step, reason: outcome.reason } });
                if (this.failFast) {
                    throw new SetupAbortedError(step, outcome.reason, this.steps);
                }
                break;
            case 'fatal':
                log.error({ message: 'Step failed, aborting', data: { step, reason: outcome.reason } });
                throw new SetupAbortedError(step, outcome.reason, this.steps);
        }

        return outcome;
    }

    /** Record a fatal outcome; never returns */
    halt(step: StepName, reason: string): never {
        this.record(step, { status: 'fatal', reason });
        // record() throws for fatal outcomes
        throw new SetupAbortedError(step, reason, this.steps);
    }

    /**
     * Whether the resource a step creates is known to be present:
     * the step succeeded, or the server reported it already exists.
     */
    satisfied(step: StepName): boolean {
        const outcome = this.outcomes.get(step);
        if (!outcome) return false;
        return outcome.status === 'ok' || (outcome.status === 'recoverable' && outcome.httpStatus === CONFLICT);
    }

    /**
     * Run a step only when every prerequisite is satisfied; otherwise record it as skipped
     */
    async gated<T>(step: StepName, requires: StepName[], run: () => Promise<StepOutcome<T>>): Promise<StepOutcome<T>> {
        const missing = requires.filter(r => !this.satisfied(r));
        if (missing.length > 0) {
            return this.record<T>(step, { status: 'skipped', reason: `requires ${missing.join(', ')}` });
        }
        return this.record(step, await run());
    }
}
