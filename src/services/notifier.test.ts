import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('./process-runner.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./process-runner.js')>();
  return { ...actual, runProcess: vi.fn() };
});

import { ProcessLaunchError, runProcess, type ProcessResult } from './process-runner.js';
import {
  DEFAULT_NOTIFY_TEMPLATE,
  buildSenderArgs,
  renderNotification,
  sendNotification,
} from './notifier.js';

const mockRunProcess = vi.mocked(runProcess);

const image = { displayName: 'app:latest', contentDigest: 'abc123' };
const notify = { url: 'generic://hooks.example.com/scan', template: 'Found: {name} ({id})' };
const sender = { command: 'shoutrrr', timeoutMs: 60_000 };

function result(partial: Partial<ProcessResult>): ProcessResult {
  return { exitCode: 0, signal: null, terminatedBy: null, stderr: '', durationMs: 5, ...partial };
}

afterEach(() => {
  vi.clearAllMocks();
});

describe('renderNotification', () => {
  it('substitutes name and id', () => {
    expect(renderNotification('Found: {name} ({id})', image)).toBe('Found: app:latest (abc123)');
  });

  it('leaves a template without placeholders unchanged', () => {
    expect(renderNotification('Scan alert', image)).toBe('Scan alert');
  });

  it('substitutes every occurrence', () => {
    expect(renderNotification('{name}/{name}/{id}', image)).toBe('app:latest/app:latest/abc123');
  });

  it('does not substitute placeholders that appear in the display name', () => {
    const odd = { displayName: 'weird-{id}:1', contentDigest: 'ff00' };
    expect(renderNotification('{name}', odd)).toBe('weird-{id}:1');
  });

  it('renders the default template', () => {
    expect(renderNotification(DEFAULT_NOTIFY_TEMPLATE, image)).toBe("Vulnerabilities found in image 'app:latest'");
  });
});

describe('buildSenderArgs', () => {
  it('passes the url and message as separate arguments', () => {
    expect(buildSenderArgs('slack://token@channel', 'hello world')).toEqual([
      'send', '--url', 'slack://token@channel', '--message', 'hello world',
    ]);
  });
});

describe('sendNotification', () => {
  it('sends the rendered message', async () => {
    mockRunProcess.mockResolvedValueOnce(result({ exitCode: 0 }));

    const res = await sendNotification(image, notify, sender);

    expect(res).toEqual({ image, status: 'sent', message: 'Found: app:latest (abc123)' });
    expect(mockRunProcess).toHaveBeenCalledWith(
      'shoutrrr',
      ['send', '--url', 'generic://hooks.example.com/scan', '--message', 'Found: app:latest (abc123)'],
      { timeoutMs: 60_000, signal: undefined },
    );
  });

  it('reports a non-zero sender exit as failed', async () => {
    mockRunProcess.mockResolvedValueOnce(result({ exitCode: 1, stderr: 'error: invalid service url' }));

    const res = await sendNotification(image, notify, sender);

    expect(res.status).toBe('failed');
    expect(res.error).toBe('sender exited with code 1: error: invalid service url');
  });

  it('reports a sender timeout as failed', async () => {
    mockRunProcess.mockResolvedValueOnce(result({ exitCode: null, signal: 'SIGTERM', terminatedBy: 'timeout' }));

    const res = await sendNotification(image, notify, sender);

    expect(res).toMatchObject({ status: 'failed', error: 'sender timed out' });
  });

  it('reports a sender that cannot be started as failed', async () => {
    mockRunProcess.mockRejectedValueOnce(new ProcessLaunchError('shoutrrr', new Error('spawn shoutrrr ENOENT')));

    const res = await sendNotification(image, notify, sender);

    expect(res).toMatchObject({ status: 'failed', error: 'Failed to launch "shoutrrr": spawn shoutrrr ENOENT' });
  });
});
