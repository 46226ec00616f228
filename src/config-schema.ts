/**
 * Config Schema Validation
 *
 * Zod schemas for the driver's YAML configuration. Every section is
 * optional; missing values fall back to the defaults declared here.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const macSchema = z.string().regex(
  /^([0-9a-fA-F]{2}[:-]){5}[0-9a-fA-F]{2}$/,
  { message: 'Invalid address: expected six hex pairs such as 00:16:53:a4:cd:7e' }
);

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

// --- Section Schemas ---

const connectionConfigSchema = z.object({
  type: z.enum(['noble', 'emulator']).default('noble'),
  address: macSchema.optional(),
  name: z.string().min(1).optional(),
  scanTimeoutMs: z.number().int().min(1000).default(30_000),
});

const hubSettingsSchema = z.object({
  /** 0 waits forever */
  replyTimeoutMs: z.number().int().min(0).default(10_000),
  deviceWaitAttempts: z.number().int().min(1).default(60),
  deviceWaitIntervalMs: z.number().int().min(1).default(100),
});

const loggingConfigSchema = z.object({
  level: logLevelSchema.optional(),
  pretty: z.boolean().optional(),
});

// --- Full Config Schema ---

export const configSchema = z.object({
  connection: connectionConfigSchema.default({}),
  hub: hubSettingsSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

// --- Type Exports ---

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.output<typeof configSchema>;
export type ConnectionConfig = Config['connection'];
export type HubSettings = Config['hub'];
export type LoggingConfig = Config['logging'];

/**
 * Validate and fill defaults
 */
export function validateConfig(data: unknown): Config {
  return configSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
