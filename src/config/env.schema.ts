import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Scheduler
  SCHEDULER_TICK_MS: z.coerce.number().int().min(100).max(60_000).default(1000),

  // Container-runtime hosts
  HOST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(300_000).default(15_000),
  HOST_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  HOST_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(1),
  DOCKER_API_VERSION: z.string().regex(/^v\d+\.\d+$/, 'expected a version such as v1.43').optional(),

  // Scanner
  SCANNER_COMMAND: z.string().min(1).default('trivy'),
  SCANNER_ENV_PREFIX: z.string().min(1).default('TRIVY'),
  SCANNER_TEMPLATE_VAR: z.string().min(1).default('TRIVY_TEMPLATE'),
  SCANNER_TEMPLATE: z.string().min(1).default('@templates/html.tpl'),
  SCAN_EXIT_CODE: z.coerce.number().int().min(1).max(255).default(1),
  SCAN_TIMEOUT_SECONDS: positiveInt(1800),
  SCAN_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  REPORT_DIR: z.string().min(1).default('/output'),
  REPORT_EXTENSION: z.string().regex(/^\.[A-Za-z0-9]+$/, 'expected an extension such as .html').default('.html'),

  // Sender
  SENDER_COMMAND: z.string().min(1).default('shoutrrr'),
  NOTIFY_TIMEOUT_SECONDS: positiveInt(60),
});

export type EnvConfig = z.infer<typeof envSchema>;
