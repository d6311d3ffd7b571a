/**
 * Configuration schema (Zod)
 *
 * Validates the switchboard YAML/JSON config: server definitions, groups and
 * connection tuning.
 */

import { z } from 'zod';

/**
 * Environment variables a server definition may not override
 */
export const BLOCKED_ENV_VARS = [
  'LD_PRELOAD',
  'LD_LIBRARY_PATH',
  'NODE_OPTIONS',
  'NODE_PATH',
  'DYLD_INSERT_LIBRARIES',
  'DYLD_LIBRARY_PATH',
];

const SHELL_METACHARACTERS = /[;|&`$]/;

/**
 * Names that collide with Object.prototype members when used as record keys
 */
export const RESERVED_NAMES = ['__proto__', 'constructor', 'prototype'];

function reservedName(kind: string): (value: string, ctx: z.RefinementCtx) => void {
  return (value: string, ctx: z.RefinementCtx): void => {
    if (RESERVED_NAMES.includes(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${kind} '${value}' is reserved` });
    }
  };
}

const GroupNameSchema = z.string().min(1).superRefine(reservedName('group name'));

// ===== Server definitions =====

export const ServerDefinitionSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .max(64)
      .regex(/^[A-Za-z0-9_.-]+$/, 'name may only contain letters, digits, "_", "." and "-"')
      .superRefine(reservedName('name')),
    command: z.string().trim().min(1, 'command must not be empty'),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    cwd: z.string().optional(),
    groups: z.array(GroupNameSchema).default([]),
  })
  .superRefine((definition, ctx) => {
    // Processes are spawned without a shell, so metacharacters point at a config mistake
    if (SHELL_METACHARACTERS.test(definition.command)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['command'],
        message: `command contains shell metacharacters: ${definition.command}`,
      });
    }
    for (const key of Object.keys(definition.env)) {
      if (BLOCKED_ENV_VARS.includes(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['env', key],
          message: `environment variable '${key}' may not be overridden`,
        });
      }
    }
  });

export type ServerDefinition = z.infer<typeof ServerDefinitionSchema>;
export type ServerDefinitionInput = z.input<typeof ServerDefinitionSchema>;

const ServerGroupSchema = z.object({
  servers: z.array(z.string().min(1)),
  description: z.string().optional(),
});

export type ServerGroup = z.infer<typeof ServerGroupSchema>;

// ===== Connection tuning =====

const ReconnectPolicySchema = z.object({
  base_delay_ms: z.number().int().min(1).default(500),
  max_delay_ms: z.number().int().min(1).default(30000),
  max_attempts: z.number().int().min(0).max(100).default(5),
  /** Upward jitter as a fraction of the delay; kept below 1 so delays grow strictly */
  jitter_ratio: z.number().min(0).max(0.9).default(0.2),
});

const HealthCheckSchema = z.object({
  interval_ms: z.number().int().min(0).default(30000),
  idle_threshold_ms: z.number().int().min(0).default(60000),
  failure_threshold: z.number().int().min(1).default(3),
  probe_timeout_ms: z.number().int().min(1).default(5000),
});

const DefaultsSchema = z.object({
  handshake_timeout_ms: z.number().int().min(1).default(10000),
  request_timeout_ms: z.number().int().min(1).default(30000),
  shutdown_grace_ms: z.number().int().min(0).default(5000),
  max_pending_requests: z.number().int().min(1).default(100),
  max_consecutive_decode_errors: z.number().int().min(1).default(5),
  reconnect: ReconnectPolicySchema.default({}),
  health_check: HealthCheckSchema.default({}),
});

export type ConnectionDefaults = z.infer<typeof DefaultsSchema>;

// ===== Root Configuration Schema =====

export const SwitchboardConfigSchema = z
  .object({
    version: z.string().default('2'),
    defaults: DefaultsSchema.default({}),
    servers: z.array(ServerDefinitionSchema),
    server_groups: z.record(GroupNameSchema, ServerGroupSchema).default({}),
    active_servers: z.array(z.string()).optional(),
  })
  .superRefine((config, ctx) => {
    const known = new Set<string>();
    config.servers.forEach((server, index) => {
      if (known.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['servers', index, 'name'],
          message: `duplicate server name '${server.name}'`,
        });
      }
      known.add(server.name);
    });

    for (const [group, definition] of Object.entries(config.server_groups)) {
      for (const member of definition.servers) {
        if (!known.has(member)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['server_groups', group],
            message: `group '${group}' references unknown server '${member}'`,
          });
        }
      }
    }

    for (const active of config.active_servers ?? []) {
      if (!known.has(active)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['active_servers'],
          message: `active server '${active}' is not defined`,
        });
      }
    }
  });

export type SwitchboardConfigInput = z.input<typeof SwitchboardConfigSchema>;
export type RawSwitchboardConfig = z.infer<typeof SwitchboardConfigSchema>;
