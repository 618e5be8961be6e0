// src/config/ConfigValidator.ts

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { InvalidConfigError } from '../utils/errors';

// Credentials Configuration Schema (environment variables take precedence)
const CredentialsConfigSchema = z
  .object({
    applicationId: z.string().min(1, 'applicationId must not be empty').optional(),
    apiKey: z.string().min(1, 'apiKey must not be empty').optional(),
  })
  .optional();

// Host Configuration Schema
const HostsConfigSchema = z
  .object({
    provider: z
      .string()
      .regex(/^[a-z0-9-]+$/, 'provider must be a lowercase DNS label')
      .optional(),
  })
  .optional();

// Transport Configuration Schema (base values, scaled by attempt number)
const TransportConfigSchema = z
  .object({
    connectTimeoutMs: z.number().int().positive().optional(),
    receiveTimeoutMs: z.number().int().positive().optional(),
  })
  .optional();

// Task Polling Configuration Schema
const TaskConfigSchema = z
  .object({
    pollIntervalMs: z.number().int().min(0).optional(),
  })
  .optional();

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z.object({
  credentials: CredentialsConfigSchema,
  hosts: HostsConfigSchema,
  transport: TransportConfigSchema,
  task: TaskConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type InitConfig = z.infer<typeof InitConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate client initialization configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration
 * @throws {InvalidConfigError} If configuration is invalid, listing every issue
 */
export function validateConfig(config: unknown): InitConfig {
  const result = InitConfigSchema.safeParse(config);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: InitConfig } | { success: false; errors: string[] } {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

/**
 * JSON Schema (draft-07) of the init configuration
 */
export function configJsonSchema() {
  return zodToJsonSchema(InitConfigSchema, {
    name: 'InitConfig',
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });
}
