import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { Writable } from 'node:stream';
import type { EnvConfig } from '../config/index.js';
import { createChildLogger } from '../utils/logger.js';
import type { Image } from '../models/image.js';
import { runProcess, ProcessLaunchError, type ProcessResult } from './process-runner.js';

const log = createChildLogger('scan-runner');

export type ScanStatus = 'clean' | 'vulnerable' | 'failed';

export interface ScanOutcome {
  image: Image;
  status: ScanStatus;
  reportPath: string;
  exitCode: number | null;
  durationMs: number;
  /** Why the scan failed; only set for `failed` */
  error?: string;
}

export interface ScannerOptions {
  command: string;
  envPrefix: string;
  templateVar: string;
  template: string;
  reportDir: string;
  reportExtension: string;
  /** Exit code the scanner is told to use when it finds vulnerabilities */
  vulnerableExitCode: number;
  timeoutMs: number;
}

export function scannerOptionsFromConfig(config: EnvConfig): ScannerOptions {
  return {
    command: config.SCANNER_COMMAND,
    envPrefix: config.SCANNER_ENV_PREFIX,
    templateVar: config.SCANNER_TEMPLATE_VAR,
    template: config.SCANNER_TEMPLATE,
    reportDir: config.REPORT_DIR,
    reportExtension: config.REPORT_EXTENSION,
    vulnerableExitCode: config.SCAN_EXIT_CODE,
    timeoutMs: config.SCAN_TIMEOUT_SECONDS * 1000,
  };
}

/**
 * The scanner gets a fresh environment: the report template variable, then
 * every variable of ours whose name starts with the scanner prefix.
 * A prefixed variable may override the template.
 */
export function buildScannerEnv(
  source: NodeJS.ProcessEnv,
  options: Pick<ScannerOptions, 'envPrefix' | 'templateVar' | 'template'>,
): Record<string, string> {
  const env: Record<string, string> = { [options.templateVar]: options.template };
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && key.startsWith(options.envPrefix)) {
      env[key] = value;
    }
  }
  return env;
}

export function reportPathFor(
  image: Image,
  options: Pick<ScannerOptions, 'reportDir' | 'reportExtension'>,
): string {
  return path.join(options.reportDir, `${image.contentDigest}${options.reportExtension}`);
}

export function buildScannerArgs(image: Image, options: ScannerOptions): string[] {
  return [
    'image',
    '--format', 'template',
    '--exit-code', String(options.vulnerableExitCode),
    '--output', reportPathFor(image, options),
    image.displayName,
  ];
}

/** Exit 0 is clean, any other exit code is vulnerable; a kill is a failed scan. */
export function classifyScanResult(result: ProcessResult): { status: ScanStatus; error?: string } {
  if (result.terminatedBy === 'timeout') return { status: 'failed', error: 'scanner timed out' };
  if (result.terminatedBy === 'aborted') return { status: 'failed', error: 'scan aborted' };
  if (result.exitCode === null) {
    return { status: 'failed', error: `scanner killed by ${result.signal ?? 'unknown signal'}` };
  }
  return { status: result.exitCode === 0 ? 'clean' : 'vulnerable' };
}

export async function ensureReportDir(reportDir: string): Promise<void> {
  try {
    await mkdir(reportDir, { recursive: true });
  } catch (err) {
    // The scanner reports its own error for an unwritable output path
    log.warn({ reportDir, err }, 'Could not create report directory');
  }
}

export interface ScanImageOptions {
  /** Process environment the scanner-prefixed variables are taken from */
  env?: NodeJS.ProcessEnv;
  stdout?: Writable;
  signal?: AbortSignal;
}

export async function scanImage(
  image: Image,
  options: ScannerOptions,
  runOptions: ScanImageOptions = {},
): Promise<ScanOutcome> {
  const reportPath = reportPathFor(image, options);
  const startedAt = Date.now();
  log.info({ image: image.displayName, digest: image.contentDigest }, 'Checking image');

  let result: ProcessResult;
  try {
    result = await runProcess(options.command, buildScannerArgs(image, options), {
      env: buildScannerEnv(runOptions.env ?? process.env, options),
      timeoutMs: options.timeoutMs,
      stdout: runOptions.stdout ?? process.stdout,
      signal: runOptions.signal,
    });
  } catch (err) {
    if (!(err instanceof ProcessLaunchError)) throw err;
    log.error({ image: image.displayName, digest: image.contentDigest, err }, 'Scanner could not be started');
    return {
      image,
      status: 'failed',
      reportPath,
      exitCode: null,
      durationMs: Date.now() - startedAt,
      error: err.message,
    };
  }

  const { status, error } = classifyScanResult(result);
  if (status === 'failed') {
    log.error(
      { image: image.displayName, digest: image.contentDigest, reason: error, stderr: result.stderr },
      'Scan failed',
    );
  } else {
    log.info(
      { image: image.displayName, digest: image.contentDigest, status, exitCode: result.exitCode, durationMs: result.durationMs },
      'Scan finished',
    );
  }

  return {
    image,
    status,
    reportPath,
    exitCode: result.exitCode,
    durationMs: result.durationMs,
    ...(error !== undefined && { error }),
  };
}
