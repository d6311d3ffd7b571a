/**
 * Configuration loader
 *
 * Reads server definitions from a YAML (or JSON) file, resolves ${ENV:VAR}
 * references, validates with Zod and folds group membership into each
 * definition.
 */

import fs from 'fs/promises';
import yaml from 'yaml';
import { ZodError } from 'zod';
import {
  ServerDefinitionSchema,
  SwitchboardConfigSchema,
  type ConnectionDefaults,
  type ServerDefinition,
  type ServerGroup,
} from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';

// Re-export types
export type {
  ConnectionDefaults,
  ServerDefinition,
  ServerDefinitionInput,
  ServerGroup,
  SwitchboardConfigInput,
} from './schema.js';
export { ServerDefinitionSchema, SwitchboardConfigSchema, BLOCKED_ENV_VARS } from './schema.js';

const MAX_CONFIG_BYTES = 1024 * 1024;

/**
 * Validated configuration as consumed by the server manager
 */
export interface SwitchboardConfig {
  version: string;
  defaults: ConnectionDefaults;
  /** Active definitions, with `groups` including every server_groups membership */
  servers: ServerDefinition[];
  groups: Record<string, ServerGroup>;
}

/**
 * Load configuration from a YAML or JSON file
 *
 * @throws ConfigurationError if the file is missing, too large, unparsable or invalid
 */
export async function loadConfig(configPath: string): Promise<SwitchboardConfig> {
  logger.info(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ConfigurationError(`Config file ${configPath} exceeds 1MB size limit`);
    }

    const fileContent = await fs.readFile(configPath, 'utf-8');

    // JSON is a subset of YAML, so one parser covers both formats
    const rawConfig: unknown = yaml.parse(fileContent, {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    });

    const config = parseConfig(resolveEnvReferences(rawConfig));
    logger.info(`[config] Loaded ${config.servers.length} server definitions`);
    return config;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config: ${error.message}`, { path: configPath });
    }
    throw error;
  }
}

/**
 * Validate an already-decoded config object
 *
 * @throws ConfigurationError listing every schema issue
 */
export function parseConfig(raw: unknown): SwitchboardConfig {
  const parsed = SwitchboardConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }

  const { version, defaults, servers, server_groups, active_servers } = parsed.data;

  const membership = new Map<string, Set<string>>();
  for (const server of servers) {
    membership.set(server.name, new Set(server.groups));
  }
  for (const [group, definition] of Object.entries(server_groups)) {
    for (const member of definition.servers) {
      membership.get(member)?.add(group);
    }
  }

  const active = active_servers ? new Set(active_servers) : null;
  const merged = servers
    .filter(server => active === null || active.has(server.name))
    .map(server => ({
      ...server,
      groups: [...(membership.get(server.name) ?? [])].sort(),
    }));

  // Inline `groups:` on a definition also count as groups
  const groups = new Map<string, ServerGroup>();
  for (const server of merged) {
    for (const group of server.groups) {
      const description = server_groups[group]?.description;
      const entry: ServerGroup =
        groups.get(group) ?? (description !== undefined ? { servers: [], description } : { servers: [] });
      entry.servers.push(server.name);
      groups.set(group, entry);
    }
  }

  return { version, defaults, servers: merged, groups: Object.fromEntries(groups) };
}

/**
 * Validate a single server definition supplied programmatically
 *
 * @throws ConfigurationError if the definition is malformed
 */
export function parseServerDefinition(raw: unknown): ServerDefinition {
  const parsed = ServerDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid server definition: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Resolve ${ENV:VAR} references in string values
 */
function resolveEnvReferences(value: unknown): unknown {
  if (typeof value === 'string') {
    const envMatch = value.match(/^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/);
    if (!envMatch) {
      return value;
    }
    const envVar = envMatch[1] ?? '';
    const resolved = process.env[envVar];
    if (resolved === undefined) {
      throw new ConfigurationError(`Environment variable ${envVar} not found`, { variable: envVar });
    }
    return resolved;
  }

  if (Array.isArray(value)) {
    return value.map(item => resolveEnvReferences(item));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, resolveEnvReferences(entry)])
    );
  }

  return value;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
