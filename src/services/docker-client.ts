import { Agent, fetch as undiciFetch } from 'undici';
import type { EnvConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import { ContainerSummaryArraySchema, type ContainerSummary } from '../models/docker.js';
import type { HostEndpoint } from '../models/host.js';

const log = createChildLogger('docker-client');

export type DockerErrorKind = 'network' | 'auth' | 'rate-limit' | 'server' | 'invalid-response' | 'aborted' | 'unknown';

export class DockerApiError extends Error {
  constructor(
    message: string,
    public readonly kind: DockerErrorKind,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'DockerApiError';
  }
}

export interface DockerClientOptions {
  timeoutMs: number;
  retries: number;
  /** e.g. `v1.43`; unset lets the daemon pick its own API version */
  apiVersion?: string;
  /** Base of the exponential backoff between retries */
  retryBaseDelayMs?: number;
}

export function dockerClientOptionsFromConfig(config: EnvConfig): DockerClientOptions {
  return {
    timeoutMs: config.HOST_TIMEOUT_MS,
    retries: config.HOST_RETRIES,
    apiVersion: config.DOCKER_API_VERSION,
  };
}

/** Anything the inventory can ask for running containers. */
export interface ContainerSource {
  readonly label: string;
  /** Rejects promptly once `signal` aborts */
  listRunningContainers(signal?: AbortSignal): Promise<ContainerSummary[]>;
}

function classifyError(status: number): DockerErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate-limit';
  if (status >= 500) return 'server';
  return 'unknown';
}

/** Resolves early when the signal aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Docker Engine API client for one host. A unix socket host gets a dispatcher
 * bound to the socket; requests then go to a placeholder `http://localhost`.
 */
export class DockerHostClient implements ContainerSource {
  readonly label: string;
  private readonly dispatcher: Agent;
  private readonly baseUrl: string;

  constructor(
    readonly endpoint: HostEndpoint,
    private readonly options: DockerClientOptions,
  ) {
    this.label = endpoint.raw;
    if (endpoint.kind === 'socket') {
      this.dispatcher = new Agent({ connect: { socketPath: endpoint.socketPath } });
      this.baseUrl = 'http://localhost';
    } else {
      this.dispatcher = new Agent({ connections: 4, pipelining: 1 });
      this.baseUrl = endpoint.baseUrl;
    }
  }

  /** `GET /containers/json` without `all=true` lists running containers only. */
  async listRunningContainers(signal?: AbortSignal): Promise<ContainerSummary[]> {
    const raw = await this.request('/containers/json', signal);
    const parsed = ContainerSummaryArraySchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      throw new DockerApiError(`Unexpected container list from ${this.label} (${where})`, 'invalid-response');
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private abortedError(): DockerApiError {
    return new DockerApiError(`Request to ${this.label} aborted`, 'aborted');
  }

  private async request(path: string, signal?: AbortSignal): Promise<unknown> {
    const { timeoutMs, retries, apiVersion, retryBaseDelayMs = 1000 } = this.options;
    const prefix = apiVersion ? `/${apiVersion}` : '';
    const url = `${this.baseUrl}${prefix}${path}`;

    for (let attempt = 0; attempt <= retries; attempt++) {
      if (signal?.aborted) throw this.abortedError();
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const res = await undiciFetch(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: signal ? AbortSignal.any([signal, controller.signal]) : controller.signal,
          dispatcher: this.dispatcher,
        });

        if (!res.ok) {
          const kind = classifyError(res.status);
          if (kind === 'rate-limit' && attempt < retries) {
            const delay = Math.pow(2, attempt) * retryBaseDelayMs;
            log.warn({ host: this.label, attempt, delay, status: res.status }, 'Rate limited, retrying');
            await sleep(delay, signal);
            continue;
          }
          throw new DockerApiError(`HTTP ${res.status}: ${res.statusText}`, kind, res.status);
        }

        try {
          return await res.json();
        } catch (err) {
          throw new DockerApiError(
            `Malformed JSON from ${this.label}: ${err instanceof Error ? err.message : String(err)}`,
            'invalid-response',
          );
        }
      } catch (err) {
        if (err instanceof DockerApiError) throw err;
        if (signal?.aborted) throw this.abortedError();
        if (attempt < retries) {
          const delay = Math.pow(2, attempt) * retryBaseDelayMs;
          log.warn({ host: this.label, attempt, delay, err }, 'Request failed, retrying');
          await sleep(delay, signal);
          continue;
        }
        const cause = err instanceof Error && err.cause instanceof Error ? err.cause.message : '';
        const msg = controller.signal.aborted
          ? `Timed out after ${timeoutMs}ms`
          : err instanceof Error ? err.message : 'Network error';
        throw new DockerApiError(cause ? `${msg}: ${cause}` : msg, 'network');
      } finally {
        clearTimeout(timer);
      }
    }
    throw new DockerApiError('Max retries exceeded', 'network');
  }
}
