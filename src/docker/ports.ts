import { ContainerDetails } from './runtime';

/**
 * Host port published for a container TCP port, or undefined when the
 * port is not published.
 */
export function resolveHostPort(container: Pick<ContainerDetails, 'ports'>, containerPort: number): string | undefined {
    const mappings = container.ports[`${containerPort}/tcp`] ?? [];
    const binding = mappings.find(m => typeof m.HostPort === 'string' && m.HostPort !== '');
    return binding?.HostPort;
}
