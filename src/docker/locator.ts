import { zone } from '../logging/zone';
import { ContainerFilters, ContainerRuntime, ContainerSummary } from './runtime';

const log = zone('docker.locator');

/**
 * Label Docker Compose puts on every container it creates
 */
export const COMPOSE_PROJECT_LABEL = 'com.docker.compose.project';

export type LocateQuery = {
    /** Substring the container name must contain */
    nameContains: string;
    /** Restrict to one compose project */
    composeProject?: string;
};

export type LocateResult =
    | { kind: 'not-found' }
    | { kind: 'found'; container: ContainerSummary }
    | { kind: 'ambiguous'; candidates: ContainerSummary[] };

/**
 * Build the Engine filters for a locate query
 */
export function buildLocateFilters(query: LocateQuery): ContainerFilters {
    const label = [COMPOSE_PROJECT_LABEL];
    if (query.composeProject) {
        label.push(`${COMPOSE_PROJECT_LABEL}=${query.composeProject}`);
    }

    return {
        label,
        name: [query.nameContains],
        status: ['running']
    };
}

/**
 * Find the single running compose container matching the query.
 * Zero matches is a result, not an error; several matches are reported
 * as ambiguous so the caller can refuse to guess.
 */
export async function locateContainer(runtime: ContainerRuntime, query: LocateQuery): Promise<LocateResult> {
    const containers = await runtime.listContainers(buildLocateFilters(query));

    if (containers.length === 0) {
        log.debug({ message: 'No running container matched', data: query });
        return { kind: 'not-found' };
    }

    if (containers.length > 1) {
        log.warn({
            message: 'Several running containers matched',
            data: { ...query, containers: containers.map(c => c.names[0] ?? c.id) }
        });
        return { kind: 'ambiguous', candidates: containers };
    }

    const [container] = containers;
    log.debug({ message: 'Container located', data: { id: container.id, name: container.names[0] } });
    return { kind: 'found', container };
}

function describeCandidate(container: ContainerSummary): string {
    const name = container.names[0] ?? container.id;
    const project = container.labels[COMPOSE_PROJECT_LABEL];
    return project ? `${name} (project ${project})` : name;
}

/**
 * Human-readable explanation for a result that did not find exactly one container
 */
export function describeLocateFailure(result: Exclude<LocateResult, { kind: 'found' }>, query: LocateQuery): string {
    const scope = query.composeProject ? ` in compose project "${query.composeProject}"` : '';
    if (result.kind === 'not-found') {
        return `no running container with name containing "${query.nameContains}"${scope}`;
    }
    const names = result.candidates.map(describeCandidate).join(', ');
    return `${result.candidates.length} running containers match "${query.nameContains}"${scope}: ${names}; set COMPOSE_PROJECT_NAME or POLARIS_CONTAINER_NAME to pick one`;
}
