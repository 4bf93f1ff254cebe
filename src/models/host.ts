export type HostEndpoint =
  | { readonly kind: 'socket'; readonly raw: string; readonly socketPath: string }
  | { readonly kind: 'tcp'; readonly raw: string; readonly baseUrl: string };

export class HostEndpointError extends Error {
  constructor(
    public readonly raw: string,
    reason: string,
  ) {
    super(`Invalid host "${raw}": ${reason}`);
    this.name = 'HostEndpointError';
  }
}

const SOCKET_PREFIX = 'unix://';

/**
 * Parse a host value from the command line.
 * `unix:///var/run/docker.sock` is a local socket; `http://`, `https://` and
 * `tcp://` (treated as plain HTTP) are remote daemons.
 */
export function parseHostEndpoint(value: string): HostEndpoint {
  const raw = value.trim();
  if (!raw) {
    throw new HostEndpointError(value, 'empty value');
  }

  if (raw.startsWith(SOCKET_PREFIX)) {
    const socketPath = raw.slice(SOCKET_PREFIX.length);
    if (!socketPath.startsWith('/')) {
      throw new HostEndpointError(raw, 'socket path must be absolute');
    }
    const host: HostEndpoint = { kind: 'socket', raw, socketPath };
    return Object.freeze(host);
  }

  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new HostEndpointError(raw, 'not a valid URL');
  }

  let protocol: string;
  switch (parsed.protocol) {
    case 'http:':
    case 'tcp:':
      protocol = 'http:';
      break;
    case 'https:':
      protocol = 'https:';
      break;
    default:
      throw new HostEndpointError(raw, `unsupported scheme "${parsed.protocol.replace(/:$/, '')}"`);
  }
  if (!parsed.hostname) {
    throw new HostEndpointError(raw, 'missing hostname');
  }

  const port = parsed.port ? `:${parsed.port}` : '';
  const path = parsed.pathname.replace(/\/+$/, '');
  const host: HostEndpoint = { kind: 'tcp', raw, baseUrl: `${protocol}//${parsed.hostname}${port}${path}` };
  return Object.freeze(host);
}

/**
 * Accepts repeated flags and comma-separated lists alike; at least one host is
 * required.
 */
export function parseHostEndpoints(values: readonly string[]): HostEndpoint[] {
  const hosts = values
    .flatMap((v) => v.split(','))
    .map((v) => v.trim())
    .filter((v) => v.length > 0)
    .map(parseHostEndpoint);
  if (hosts.length === 0) {
    throw new HostEndpointError(values.join(','), 'at least one host is required');
  }
  return hosts;
}
