import { SetupSettings } from './config';

/**
 * A client id and secret pair accepted by the token endpoint
 */
export interface Credential {
    clientId: string;
    clientSecret: string;
}

/**
 * Names and locations the provisioning calls operate on, resolved once
 * from settings before the first call.
 */
export interface ProvisioningContext {
    catalogName: string;
    defaultBaseLocation: string;
    storageType: SetupSettings['storageType'];
    allowedLocations: string[];
    principalName: string;
    principalRoleName: string;
    catalogRoleName: string;
}

export type StepName =
    | 'locate-container'
    | 'extract-root-credentials'
    | 'resolve-port'
    | 'exchange-token'
    | 'create-catalog'
    | 'create-principal'
    | 'create-principal-role'
    | 'assign-principal-role'
    | 'create-catalog-role'
    | 'assign-catalog-role'
    | 'grant-privilege';

/**
 * Outcome of one orchestration step.
 * - ok: the step succeeded
 * - recoverable: the step failed; later independent steps still run
 * - skipped: a step it depends on did not succeed
 * - fatal: the run cannot continue
 */
export type StepOutcome<T> =
    | { status: 'ok'; value: T }
    | { status: 'recoverable'; reason: string; httpStatus?: number }
    | { status: 'skipped'; reason: string }
    | { status: 'fatal'; reason: string };

export type StepStatus = StepOutcome<unknown>['status'];

export interface StepRecord {
    step: StepName;
    status: StepStatus;
    reason?: string;
    httpStatus?: number;
}

export interface SetupResult {
    root: Credential;
    principal?: Credential;
    apiHost: string;
    apiPort: string;
    catalogName: string;
    steps: StepRecord[];
}
