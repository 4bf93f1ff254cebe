import { parseArgs } from 'node:util';
import { z } from 'zod';
import { DEFAULT_NOTIFY_TEMPLATE } from '../services/notifier.js';

export const VERSION = '0.1.0';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | {
      kind: 'run';
      schedule: string;
      notifyUrl: string;
      notifyTemplate: string;
      hosts: string[];
      runOnce: boolean;
    };

const RunArgsSchema = z.object({
  schedule: z.string({ required_error: '--schedule is required' }).trim().min(1, '--schedule must not be empty'),
  'notify-url': z.string({ required_error: '--notify-url is required' }).trim().min(1, '--notify-url must not be empty'),
  'notify-template': z.string().default(DEFAULT_NOTIFY_TEMPLATE),
  hosts: z.array(z.string(), { required_error: 'at least one --hosts value is required' })
    .min(1, 'at least one --hosts value is required'),
  'run-once': z.boolean().default(false),
});

export function usage(): string {
  return `
container-scan-scheduler ${VERSION}
Scan the images of running containers on a schedule and notify on vulnerabilities

Usage:
  container-scan-scheduler -s <cron> -u <url> -H <host> [-H <host> ...] [options]

Options:
  -s, --schedule <cron>           When to scan, in cron format (UTC)
  -u, --notify-url <url>          Destination URL passed to the sender
  -t, --notify-template <text>    Message sent for a vulnerable image; {name} and {id}
                                  are replaced with its name and digest
                                  (default: "${DEFAULT_NOTIFY_TEMPLATE}")
  -H, --hosts <host>              Docker host, repeatable or comma-separated;
                                  unix:///path for a socket, otherwise a URL
      --run-once                  Run a single scan now and exit
  -h, --help                      Show this help
  -V, --version                   Show the version

Examples:
  container-scan-scheduler -s "0 0 3 * * *" -u "slack://token@channel" -H unix:///var/run/docker.sock
  container-scan-scheduler -s "@hourly" -u "generic://hooks.example.com/scan" -H tcp://10.0.0.5:2375,tcp://10.0.0.6:2375

Environment:
  The scanner runs with only the report template and the scanner-prefixed
  variables (TRIVY_* by default) set, without PATH. Where the scanner binary is
  outside the system default path (/usr/bin:/bin on glibc), set SCANNER_COMMAND
  to its absolute path, e.g. SCANNER_COMMAND=/usr/local/bin/trivy.
`.trim();
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        schedule: { type: 'string', short: 's' },
        'notify-url': { type: 'string', short: 'u' },
        'notify-template': { type: 'string', short: 't' },
        hosts: { type: 'string', short: 'H', multiple: true },
        'run-once': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'V' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const values = readFlags(argv);
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  const result = RunArgsSchema.safeParse(values);
  if (!result.success) {
    throw new CliUsageError(result.error.issues.map((i) => i.message).join('\n'));
  }
  const args = result.data;
  return {
    kind: 'run',
    schedule: args.schedule,
    notifyUrl: args['notify-url'],
    notifyTemplate: args['notify-template'],
    hosts: args.hosts,
    runOnce: args['run-once'],
  };
}
