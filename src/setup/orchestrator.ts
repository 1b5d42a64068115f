import { AxiosInstance } from 'axios';
import { zone } from '../logging/zone';
import { ContainerDetails, ContainerRuntime } from '../docker/runtime';
import { describeLocateFailure, locateContainer, LocateQuery, LocateResult } from '../docker/locator';
import { resolveHostPort } from '../docker/ports';
import { getErrorMessage, managementBaseUri, tokenEndpoint } from '../api/http';
import {
    assignCatalogRoleToPrincipalRole,
    assignPrincipalRole,
    createCatalog,
    createCatalogRole,
    createPrincipal,
    createPrincipalRole,
    exchangeToken,
    grantCatalogPrivilege,
    ManagementTarget
} from '../api/management';
import { CatalogPrivilege } from '../api/schemas';
import { SetupSettings } from '../types/config';
import { Credential, ProvisioningContext, SetupResult } from '../types/setup';
import { readRootCredentials } from './credentials';
import { attempt, ok, StepRecorder } from './steps';

const log = zone('setup.orchestrator');

export const GRANTED_PRIVILEGE: CatalogPrivilege = 'CATALOG_MANAGE_CONTENT';

export type SetupDependencies = {
    runtime: ContainerRuntime;
    http: AxiosInstance;
};

export function provisioningContextFrom(settings: SetupSettings): ProvisioningContext {
    return {
        catalogName: settings.catalogName,
        defaultBaseLocation: settings.defaultBaseLocation,
        storageType: settings.storageType,
        allowedLocations: settings.allowedLocations && settings.allowedLocations.length > 0
            ? [...settings.allowedLocations]
            : [settings.defaultBaseLocation],
        principalName: settings.principalName,
        principalRoleName: settings.principalRoleName,
        catalogRoleName: settings.catalogRoleName,
    };
}

/**
 * Locate the catalog server, recover its root credentials, obtain a root
 * token and provision catalog, principal, roles and grant.
 *
 * Throws SetupAbortedError when the container, the root credentials or the
 * token cannot be obtained. Management call failures are recorded and the
 * sequence continues with every step that does not depend on the failed one.
 */
export async function runSetup(settings: SetupSettings, deps: SetupDependencies): Promise<SetupResult> {
    const steps = new StepRecorder(settings.failFast);
    const ctx = provisioningContextFrom(settings);

    // 1. Container and root credentials
    const query: LocateQuery = { nameContains: settings.containerName, composeProject: settings.composeProject };
    let located: LocateResult;
    try {
        located = await locateContainer(deps.runtime, query);
    } catch (err) {
        return steps.halt('locate-container', `container runtime unavailable: ${getErrorMessage(err)}`);
    }
    if (located.kind !== 'found') {
        return steps.halt('locate-container', describeLocateFailure(located, query));
    }
    const containerId = located.container.id;
    steps.record('locate-container', ok(located.container.names[0] ?? containerId));

    let details: ContainerDetails;
    let root: Credential | undefined;
    try {
        details = await deps.runtime.inspectContainer(containerId);
        root = await readRootCredentials(deps.runtime, details);
    } catch (err) {
        return steps.halt('extract-root-credentials', `cannot read container ${containerId}: ${getErrorMessage(err)}`);
    }

    if (!root) {
        return steps.halt('extract-root-credentials', 'no root principal credentials found in container logs');
    }
    steps.record('extract-root-credentials', ok(root.clientId));
    log.info({ message: 'Root principal credentials recovered', data: root, private: true });

    // 2. API endpoint
    let apiPort: string;
    if (settings.apiPort !== undefined) {
        apiPort = String(settings.apiPort);
    } else {
        const published = resolveHostPort(details, settings.containerPort);
        if (published === undefined) {
            log.warn({
                message: 'Container port is not published, using it as the host port',
                data: { containerPort: settings.containerPort }
            });
        }
        apiPort = published ?? String(settings.containerPort);
    }
    steps.record('resolve-port', ok(apiPort));
    log.info({ message: 'Using catalog server', data: { host: settings.apiHost, port: apiPort } });

    // 3. Root token; every management call needs it
    const token = await exchangeToken(deps.http, tokenEndpoint(settings.apiHost, apiPort), root);
    if (!token) {
        return steps.halt('exchange-token', 'root credentials were not accepted by the token endpoint');
    }
    steps.record('exchange-token', ok(true));
    log.debug({ message: 'Root token obtained', data: token, private: true });

    const target: ManagementTarget = {
        http: deps.http,
        baseUri: managementBaseUri(settings.apiHost, apiPort),
        token,
    };

    // 4. Catalog
    steps.record('create-catalog', await attempt(() => createCatalog(target, {
        name: ctx.catalogName,
        defaultBaseLocation: ctx.defaultBaseLocation,
        storageType: ctx.storageType,
        allowedLocations: ctx.allowedLocations,
    })));

    // 5. Principal
    const principalOutcome = steps.record('create-principal', await attempt(() => createPrincipal(target, ctx.principalName)));
    const principal = principalOutcome.status === 'ok' ? principalOutcome.value : undefined;
    if (principal) {
        log.info({ message: 'Principal credentials issued', data: principal, private: true });
    }

    // 6. Principal role
    steps.record('create-principal-role', await attempt(() => createPrincipalRole(target, ctx.principalRoleName)));
    await steps.gated('assign-principal-role', ['create-principal', 'create-principal-role'],
        () => attempt(() => assignPrincipalRole(target, ctx.principalName, ctx.principalRoleName)));

    // 7. Catalog role, its association and grant
    await steps.gated('create-catalog-role', ['create-catalog'],
        () => attempt(() => createCatalogRole(target, ctx.catalogName, ctx.catalogRoleName)));
    await steps.gated('assign-catalog-role', ['create-principal-role', 'create-catalog-role'],
        () => attempt(() => assignCatalogRoleToPrincipalRole(target, ctx.principalRoleName, ctx.catalogName, ctx.catalogRoleName)));
    await steps.gated('grant-privilege', ['create-catalog-role'],
        () => attempt(() => grantCatalogPrivilege(target, ctx.catalogName, ctx.catalogRoleName, GRANTED_PRIVILEGE)));

    const result: SetupResult = {
        root,
        principal,
        apiHost: settings.apiHost,
        apiPort,
        catalogName: ctx.catalogName,
        steps: steps.steps,
    };

    const failed = result.steps.filter(s => s.status !== 'ok');
    if (failed.length > 0) {
        log.warn({ message: 'Setup finished with failed steps', data: failed });
    } else {
        log.info({ message: 'Setup finished', data: { catalog: ctx.catalogName, principal: ctx.principalName } });
    }

    return result;
}
