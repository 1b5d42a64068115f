import Docker from 'dockerode';

/**
 * Filters accepted by the Engine's container list endpoint
 */
export type ContainerFilters = {
    label?: string[];
    name?: string[];
    status?: string[];
};

/**
 * Summary of a listed container
 */
export interface ContainerSummary {
    id: string;
    names: string[];
    labels: Record<string, string>;
}

/**
 * Published ports keyed by "{port}/{protocol}", as reported by inspect
 */
export type PortBindingTable = Record<string, Array<{ HostIp?: string; HostPort?: string }> | null | undefined>;

export interface ContainerDetails {
    id: string;
    name: string;
    tty: boolean;
    ports: PortBindingTable;
}

/**
 * The subset of the container runtime the setup run queries.
 * Nothing here starts, stops or mutates a container.
 */
export interface ContainerRuntime {
    listContainers(filters: ContainerFilters): Promise<ContainerSummary[]>;
    inspectContainer(id: string): Promise<ContainerDetails>;
    /** Full log history, stdout and stderr, each line prefixed with its timestamp */
    readLogs(id: string): Promise<Buffer>;
}

function toEngineFilters(filters: ContainerFilters): Record<string, string[]> {
    const engineFilters: Record<string, string[]> = {};
    if (filters.label?.length) engineFilters.label = filters.label;
    if (filters.name?.length) engineFilters.name = filters.name;
    if (filters.status?.length) engineFilters.status = filters.status;
    return engineFilters;
}

/**
 * ContainerRuntime backed by the local Docker Engine (DOCKER_HOST or the default socket)
 */
export class DockerRuntime implements ContainerRuntime {
    private docker: Docker;

    constructor(docker?: Docker) {
        this.docker = docker || new Docker();
    }

    async listContainers(filters: ContainerFilters): Promise<ContainerSummary[]> {
        const containers = await this.docker.listContainers({ all: true, filters: toEngineFilters(filters) });
        return containers.map(c => ({
            id: c.Id,
            names: c.Names.map(n => n.replace(/^\//, '')),
            labels: c.Labels ?? {}
        }));
    }

    async inspectContainer(id: string): Promise<ContainerDetails> {
        const info = await this.docker.getContainer(id).inspect();
        return {
            id: info.Id,
            name: info.Name.replace(/^\//, ''),
            tty: info.Config?.Tty === true,
            ports: info.NetworkSettings?.Ports ?? {}
        };
    }

    async readLogs(id: string): Promise<Buffer> {
        return this.docker.getContainer(id).logs({
            stdout: true,
            stderr: true,
            timestamps: true,
            follow: false
        });
    }
}
