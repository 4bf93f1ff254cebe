import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('./process-runner.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./process-runner.js')>();
  return { ...actual, runProcess: vi.fn() };
});

import { ProcessLaunchError, runProcess, type ProcessResult } from './process-runner.js';
import {
  buildScannerArgs,
  buildScannerEnv,
  classifyScanResult,
  scanImage,
  type ScannerOptions,
} from './scan-runner.js';

const mockRunProcess = vi.mocked(runProcess);

const options: ScannerOptions = {
  command: 'trivy',
  envPrefix: 'TRIVY',
  templateVar: 'TRIVY_TEMPLATE',
  template: '@templates/html.tpl',
  reportDir: '/output',
  reportExtension: '.html',
  vulnerableExitCode: 1,
  timeoutMs: 60_000,
};

const image = { displayName: 'app:latest', contentDigest: 'abc123' };

function result(partial: Partial<ProcessResult>): ProcessResult {
  return { exitCode: 0, signal: null, terminatedBy: null, stderr: '', durationMs: 12, ...partial };
}

afterEach(() => {
  vi.clearAllMocks();
});

describe('buildScannerEnv', () => {
  it('passes only prefixed variables plus the template', () => {
    const env = buildScannerEnv(
      { PATH: '/usr/bin', HOME: '/root', TRIVY_SEVERITY: 'HIGH,CRITICAL', TRIVY_QUIET: 'true', NOT_TRIVY: 'x' },
      options,
    );
    expect(env).toEqual({
      TRIVY_TEMPLATE: '@templates/html.tpl',
      TRIVY_SEVERITY: 'HIGH,CRITICAL',
      TRIVY_QUIET: 'true',
    });
  });

  it('lets a prefixed variable override the template', () => {
    const env = buildScannerEnv({ TRIVY_TEMPLATE: '@custom.tpl' }, options);
    expect(env).toEqual({ TRIVY_TEMPLATE: '@custom.tpl' });
  });
});

describe('buildScannerArgs', () => {
  it('writes the report under the digest and scans by display name', () => {
    expect(buildScannerArgs(image, options)).toEqual([
      'image',
      '--format', 'template',
      '--exit-code', '1',
      '--output', '/output/abc123.html',
      'app:latest',
    ]);
  });

  it('uses the configured vulnerable exit code', () => {
    expect(buildScannerArgs(image, { ...options, vulnerableExitCode: 4 })).toContain('4');
  });
});

describe('classifyScanResult', () => {
  it('treats exit 0 as clean', () => {
    expect(classifyScanResult(result({ exitCode: 0 }))).toEqual({ status: 'clean' });
  });

  it('treats any other exit code as vulnerable', () => {
    expect(classifyScanResult(result({ exitCode: 1 }))).toEqual({ status: 'vulnerable' });
    expect(classifyScanResult(result({ exitCode: 2 }))).toEqual({ status: 'vulnerable' });
  });

  it('treats a timeout as a failed scan', () => {
    expect(classifyScanResult(result({ exitCode: null, signal: 'SIGTERM', terminatedBy: 'timeout' }))).toEqual({
      status: 'failed',
      error: 'scanner timed out',
    });
  });

  it('treats an external kill as a failed scan', () => {
    expect(classifyScanResult(result({ exitCode: null, signal: 'SIGKILL' }))).toEqual({
      status: 'failed',
      error: 'scanner killed by SIGKILL',
    });
  });
});

describe('scanImage', () => {
  it('runs the scanner with the built args and environment', async () => {
    mockRunProcess.mockResolvedValueOnce(result({ exitCode: 1, durationMs: 40 }));

    const outcome = await scanImage(image, options, { env: { TRIVY_SEVERITY: 'CRITICAL', SECRET: 'test-secret' } });

    expect(outcome).toEqual({
      image,
      status: 'vulnerable',
      reportPath: '/output/abc123.html',
      exitCode: 1,
      durationMs: 40,
    });
    expect(mockRunProcess).toHaveBeenCalledWith('trivy', buildScannerArgs(image, options), expect.objectContaining({
      env: { TRIVY_TEMPLATE: '@templates/html.tpl', TRIVY_SEVERITY: 'CRITICAL' },
      timeoutMs: 60_000,
    }));
  });

  it('reports a scanner that cannot be started as failed, never vulnerable', async () => {
    mockRunProcess.mockRejectedValueOnce(new ProcessLaunchError('trivy', new Error('spawn trivy ENOENT')));

    const outcome = await scanImage(image, options, { env: {} });

    expect(outcome.status).toBe('failed');
    expect(outcome.error).toBe('Failed to launch "trivy": spawn trivy ENOENT');
    expect(outcome.exitCode).toBeNull();
  });

  it('forwards the abort signal to the process', async () => {
    mockRunProcess.mockResolvedValueOnce(result({ exitCode: null, signal: 'SIGTERM', terminatedBy: 'aborted' }));
    const controller = new AbortController();

    const outcome = await scanImage(image, options, { env: {}, signal: controller.signal });

    expect(outcome).toMatchObject({ status: 'failed', error: 'scan aborted' });
    expect(mockRunProcess.mock.calls[0][2]?.signal).toBe(controller.signal);
  });
});
