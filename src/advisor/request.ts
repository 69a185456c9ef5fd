/**
 * Migration request validation
 *
 * Two layers:
 * - the type schema, which the advisor itself applies: finite numbers,
 *   strings and a known data type, no ranges
 * - the field schema, which callers (MCP tool, CLI) apply to user input:
 *   ranges, integer fields and form defaults
 */

import { z } from 'zod';
import { DATA_TYPES } from '../types/index.js';
import type { MigrationRequest } from '../types/index.js';
import { InvalidRequestError } from './errors.js';

const finiteNumber = z.number().finite();

const resourceConstraintsTypeSchema = z.object({
  cpu_utilization: finiteNumber,
  memory_utilization: finiteNumber,
  network_bandwidth: finiteNumber.optional(),
  disk_io: finiteNumber.optional(),
  concurrent_migrations: finiteNumber.optional(),
});

export const migrationRequestTypeSchema = z.object({
  name: z.string().optional(),
  size_mb: finiteNumber,
  schema_complexity: finiteNumber,
  data_type: z.enum(DATA_TYPES),
  source_system: z.string(),
  target_system: z.string(),
  priority: finiteNumber.optional(),
  current_quality: finiteNumber,
  resource_constraints: resourceConstraintsTypeSchema,
});

/**
 * Type-check an untyped request. The first problem found is raised as an
 * InvalidRequestError naming the offending field; ranges are not checked.
 */
export function parseMigrationRequest(input: unknown): MigrationRequest {
  const result = migrationRequestTypeSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(request)';
    throw new InvalidRequestError(field, issue?.message ?? 'Invalid input', {
      details: { issues: result.error.issues.length },
    });
  }
  return result.data;
}

const fraction = z.number().min(0).max(1);

/**
 * Flat, range-checked request fields with the dashboard form defaults.
 * Used as the MCP tool input shape and as the CLI's starting values.
 */
export const migrationFieldsShape = {
  name: z.string().min(1).max(200).default('users_table')
    .describe('Table, collection or dataset name'),
  size_mb: z.number().positive().max(1_000_000).default(2500)
    .describe('Total size of the data in MB'),
  schema_complexity: fraction.default(0.7)
    .describe('0.0 = simple flat structure, 1.0 = complex nested relationships'),
  data_type: z.enum(DATA_TYPES).default('structured')
    .describe('Structure of the data'),
  source_system: z.string().min(1).max(100).default('postgresql')
    .describe('Where the data currently resides (e.g. postgresql, mysql, mongodb, csv)'),
  target_system: z.string().min(1).max(100).default('spark')
    .describe('Where the data is migrated to (e.g. spark, bigquery, snowflake)'),
  priority: z.number().int().min(1).max(5).default(3)
    .describe('1 = low priority, 5 = critical business need'),
  current_quality: fraction.default(0.85)
    .describe('How clean and accurate the current data is'),
  cpu_utilization: fraction.default(0.6)
    .describe('Available CPU: 0.0 = none, 1.0 = full access'),
  memory_utilization: fraction.default(0.7)
    .describe('Available memory: 0.0 = none, 1.0 = full access'),
  network_bandwidth: fraction.default(0.8)
    .describe('Network speed: 0.0 = slow, 1.0 = high-speed'),
  disk_io: fraction.default(0.5)
    .describe('Storage performance: 0.0 = slow, 1.0 = high-performance'),
  concurrent_migrations: z.number().int().min(1).max(50).default(2)
    .describe('How many migrations can run simultaneously'),
};

export const migrationFieldsSchema = z.object(migrationFieldsShape);

export type MigrationFields = z.infer<typeof migrationFieldsSchema>;

export function defaultMigrationFields(): MigrationFields {
  return migrationFieldsSchema.parse({});
}

export function requestFromFields(fields: MigrationFields): MigrationRequest {
  return {
    name: fields.name,
    size_mb: fields.size_mb,
    schema_complexity: fields.schema_complexity,
    data_type: fields.data_type,
    source_system: fields.source_system,
    target_system: fields.target_system,
    priority: fields.priority,
    current_quality: fields.current_quality,
    resource_constraints: {
      cpu_utilization: fields.cpu_utilization,
      memory_utilization: fields.memory_utilization,
      network_bandwidth: fields.network_bandwidth,
      disk_io: fields.disk_io,
      concurrent_migrations: fields.concurrent_migrations,
    },
  };
}

function clampFraction(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function clampOptional(value: number | undefined, clamp: (v: number) => number): number | undefined {
  return value === undefined ? undefined : clamp(value);
}

/**
 * Clamp a request into the advisor's valid ranges instead of rejecting it.
 * Returns a new request; the input is not modified.
 */
export function clampRequest(request: MigrationRequest): MigrationRequest {
  const rc = request.resource_constraints;
  return {
    ...request,
    size_mb: Math.max(1, request.size_mb),
    schema_complexity: clampFraction(request.schema_complexity),
    current_quality: clampFraction(request.current_quality),
    priority: clampOptional(request.priority, v => Math.min(5, Math.max(1, Math.round(v)))),
    resource_constraints: {
      cpu_utilization: clampFraction(rc.cpu_utilization),
      memory_utilization: clampFraction(rc.memory_utilization),
      network_bandwidth: clampOptional(rc.network_bandwidth, clampFraction),
      disk_io: clampOptional(rc.disk_io, clampFraction),
      concurrent_migrations: clampOptional(rc.concurrent_migrations, v => Math.max(1, Math.round(v))),
    },
  };
}
