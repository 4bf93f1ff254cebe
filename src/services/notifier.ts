import type { EnvConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import type { Image } from '../models/image.js';
import { runProcess, ProcessLaunchError } from './process-runner.js';

const log = createChildLogger('notifier');

export const DEFAULT_NOTIFY_TEMPLATE = "Vulnerabilities found in image '{name}'";

export interface NotifyConfig {
  /** Destination handed to the sender as-is */
  url: string;
  template: string;
}

export interface SenderOptions {
  command: string;
  timeoutMs: number;
}

export function senderOptionsFromConfig(config: EnvConfig): SenderOptions {
  return {
    command: config.SENDER_COMMAND,
    timeoutMs: config.NOTIFY_TIMEOUT_SECONDS * 1000,
  };
}

export interface NotificationResult {
  image: Image;
  status: 'sent' | 'failed';
  message: string;
  error?: string;
}

const PLACEHOLDER_RE = /\{(name|id)\}/g;

/**
 * `{name}` becomes the display name and `{id}` the content digest. Both are
 * replaced in one pass, so a display name that itself contains `{id}` is
 * left as written.
 */
export function renderNotification(template: string, image: Image): string {
  return template.replace(PLACEHOLDER_RE, (_match, key: string) =>
    key === 'name' ? image.displayName : image.contentDigest,
  );
}

export function buildSenderArgs(url: string, message: string): string[] {
  return ['send', '--url', url, '--message', message];
}

export async function sendNotification(
  image: Image,
  notify: NotifyConfig,
  options: SenderOptions,
  signal?: AbortSignal,
): Promise<NotificationResult> {
  const message = renderNotification(notify.template, image);

  let error: string | undefined;
  try {
    const result = await runProcess(options.command, buildSenderArgs(notify.url, message), {
      timeoutMs: options.timeoutMs,
      signal,
    });
    if (result.terminatedBy) {
      error = result.terminatedBy === 'timeout' ? 'sender timed out' : 'sender aborted';
    } else if (result.exitCode !== 0) {
      error = result.exitCode === null
        ? `sender killed by ${result.signal ?? 'unknown signal'}`
        : `sender exited with code ${result.exitCode}${result.stderr ? `: ${result.stderr}` : ''}`;
    }
  } catch (err) {
    if (!(err instanceof ProcessLaunchError)) throw err;
    error = err.message;
  }

  if (error !== undefined) {
    log.error({ image: image.displayName, digest: image.contentDigest, reason: error }, 'Failed to send notification');
    return { image, status: 'failed', message, error };
  }

  log.info({ image: image.displayName, digest: image.contentDigest }, 'Notification sent');
  return { image, status: 'sent', message };
}
