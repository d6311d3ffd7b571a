import {
  ConfigurationError,
  logger,
  parseServerDefinition,
  type Logger,
  type ServerDefinition,
  type ServerGroup,
  type SwitchboardConfig,
} from '@switchboard/core';
import type { CommandTarget, ConnectionState } from '@switchboard/protocol';
import { StdioConnection, type ConnectionHealthDetail } from './stdio-connection.js';
import {
  connectionOptionsFromDefaults,
  healthCheckPolicyFromDefaults,
  type ConnectionOptions,
  type HealthCheckPolicy,
} from './types.js';

export const DEFAULT_HEALTH_CHECK_POLICY: HealthCheckPolicy = {
  intervalMs: 30_000,
  idleThresholdMs: 60_000,
  failureThreshold: 3,
  probeTimeoutMs: 5_000,
};

export interface ServerManagerOptions {
  connection?: Partial<ConnectionOptions>;
  healthCheck?: Partial<HealthCheckPolicy>;
  /** Group descriptions; membership comes from each definition's `groups` */
  groups?: Record<string, ServerGroup>;
  logger?: Logger;
}

export interface ResolvedTarget {
  connections: StdioConnection[];
  /** Members that exist in the target but are not ready (or unknown single names) */
  unavailable: string[];
}

export type ConnectResult = { ok: true } | { ok: false; code: string; error: string };

export interface HealthCheckReport {
  /** Connections taken out of service by this pass */
  degraded: string[];
  /** Idle connections that were pinged */
  probed: string[];
}

export interface ManagerStatus {
  total_servers: number;
  ready_servers: number;
  servers: Array<{ name: string; state: ConnectionState; groups: string[] }>;
  groups: Record<string, string[]>;
}

/**
 * Server Manager
 *
 * Registry of server definitions and the connection owned by each one.
 * Resolves command targets against live connection state and runs the
 * periodic health checks.
 */
export class ServerManager {
  private definitions = new Map<string, ServerDefinition>();
  private connections = new Map<string, StdioConnection>();
  private groupDescriptions = new Map<string, string>();
  private readonly connectionOptions: Partial<ConnectionOptions>;
  private readonly healthPolicy: HealthCheckPolicy;
  private readonly log: Logger;
  private healthCheckInterval: NodeJS.Timeout | null = null;
  private healthCheckRunning: Promise<HealthCheckReport> | null = null;

  constructor(options: ServerManagerOptions = {}) {
    this.connectionOptions = options.connection ?? {};
    this.healthPolicy = { ...DEFAULT_HEALTH_CHECK_POLICY, ...options.healthCheck };
    this.log = (options.logger ?? logger).child({ component: 'manager' });

    for (const [group, definition] of Object.entries(options.groups ?? {})) {
      if (definition.description !== undefined) {
        this.groupDescriptions.set(group, definition.description);
      }
    }
  }

  /**
   * Build a manager with every server of a loaded config registered
   */
  static fromConfig(
    config: SwitchboardConfig,
    overrides: Pick<ServerManagerOptions, 'connection' | 'logger'> = {}
  ): ServerManager {
    const manager = new ServerManager({
      connection: { ...connectionOptionsFromDefaults(config.defaults), ...overrides.connection },
      healthCheck: healthCheckPolicyFromDefaults(config.defaults),
      groups: config.groups,
      ...(overrides.logger ? { logger: overrides.logger } : {}),
    });
    manager.registerAll(config.servers);
    return manager;
  }

  get healthCheckPolicy(): HealthCheckPolicy {
    return { ...this.healthPolicy };
  }

  /**
   * Validate and add a definition. Does not connect.
   *
   * @throws ConfigurationError on a malformed or duplicate definition
   */
  register(raw: unknown): ServerDefinition {
    const definition = parseServerDefinition(raw);
    if (this.definitions.has(definition.name)) {
      throw new ConfigurationError(`Server '${definition.name}' is already registered`, {
        server: definition.name,
      });
    }

    this.definitions.set(definition.name, definition);
    this.connections.set(definition.name, this.createConnection(definition));
    this.log.info(`[manager] Registered ${definition.name}`);
    return definition;
  }

  registerAll(definitions: readonly unknown[]): ServerDefinition[] {
    return definitions.map(definition => this.register(definition));
  }

  /**
   * Drive one server to ready. A closed connection is replaced first.
   *
   * @throws ConfigurationError for an unregistered name, otherwise whatever connect() throws
   */
  async connect(name: string): Promise<void> {
    const definition = this.definitions.get(name);
    let connection = this.connections.get(name);
    if (!definition || !connection) {
      throw new ConfigurationError(`Server '${name}' is not registered`, { server: name });
    }

    if (connection.state === 'closed') {
      connection = this.createConnection(definition);
      this.connections.set(name, connection);
    }

    await connection.connect();
  }

  /**
   * Connect every registered server; failures do not affect siblings
   */
  async connectAll(): Promise<Record<string, ConnectResult>> {
    const names = [...this.definitions.keys()];
    this.log.info(`[manager] Connecting ${names.length} servers...`);

    const settled = await Promise.allSettled(names.map(name => this.connect(name)));

    const report: Record<string, ConnectResult> = {};
    settled.forEach((result, index) => {
      const name = names[index] ?? '';
      if (result.status === 'fulfilled') {
        report[name] = { ok: true };
        return;
      }
      const reason: unknown = result.reason;
      const message = reason instanceof Error ? reason.message : String(reason);
      const code = typeof reason === 'object' && reason !== null && 'code' in reason ? String(reason.code) : 'internal_error';
      this.log.error({ err: reason }, `[manager] Failed to connect ${name}`);
      report[name] = { ok: false, code, error: message };
    });

    const ready = Object.values(report).filter(entry => entry.ok).length;
    this.log.info(`[manager] ${ready}/${names.length} servers ready`);
    return report;
  }

  /**
   * Connections a target addresses right now
   */
  resolve(target: CommandTarget): ResolvedTarget {
    switch (target.kind) {
      case 'single': {
        const connection = this.connections.get(target.server);
        return connection?.isReady()
          ? { connections: [connection], unavailable: [] }
          : { connections: [], unavailable: [target.server] };
      }
      case 'group':
        return this.partition(this.groupMembers(target.group));
      case 'broadcast':
        return {
          connections: [...this.connections.values()].filter(connection => connection.isReady()),
          unavailable: [],
        };
    }
  }

  getConnection(name: string): StdioConnection | undefined {
    return this.connections.get(name);
  }

  /**
   * Members of a group, in registration order
   */
  groupMembers(group: string): string[] {
    return [...this.definitions.values()]
      .filter(definition => definition.groups.includes(group))
      .map(definition => definition.name);
  }

  listGroups(): string[] {
    const groups = new Set<string>();
    for (const definition of this.definitions.values()) {
      definition.groups.forEach(group => groups.add(group));
    }
    return [...groups].sort();
  }

  groupDescription(group: string): string | undefined {
    return this.groupDescriptions.get(group);
  }

  /**
   * One health pass over the ready connections
   *
   * Connections at the failure threshold are degraded outright; idle ones get
   * a ping and are degraded if it goes unanswered. Overlapping calls share a
   * single pass.
   */
  healthCheck(): Promise<HealthCheckReport> {
    if (!this.healthCheckRunning) {
      this.healthCheckRunning = this.runHealthCheck().finally(() => {
        this.healthCheckRunning = null;
      });
    }
    return this.healthCheckRunning;
  }

  startHealthChecks(intervalMs = this.healthPolicy.intervalMs): void {
    this.stopHealthChecks();
    if (intervalMs <= 0) {
      return;
    }

    this.healthCheckInterval = setInterval(() => {
      this.healthCheck().catch(err => {
        this.log.error({ err }, '[manager] Health check failed');
      });
    }, intervalMs);
    this.healthCheckInterval.unref();
    this.log.info(`[manager] Health checks every ${intervalMs}ms`);
  }

  stopHealthChecks(): void {
    if (this.healthCheckInterval) {
      clearInterval(this.healthCheckInterval);
      this.healthCheckInterval = null;
    }
  }

  /**
   * Disconnect everything and wait for every process to exit
   */
  async shutdownAll(): Promise<void> {
    this.log.info('[manager] Shutting down all connections...');
    this.stopHealthChecks();

    const stopPromises = [...this.connections.values()].map(connection =>
      connection.disconnect().catch(err => {
        this.log.error({ err }, `[manager] Error stopping ${connection.name}`);
      })
    );
    await Promise.allSettled(stopPromises);

    this.log.info('[manager] Shutdown complete');
  }

  getStatus(): ManagerStatus {
    const servers = [...this.definitions.values()].map(definition => ({
      name: definition.name,
      state: this.connections.get(definition.name)?.state ?? 'closed',
      groups: definition.groups,
    }));

    const groups: Record<string, string[]> = {};
    for (const group of this.listGroups()) {
      groups[group] = this.groupMembers(group);
    }

    return {
      total_servers: servers.length,
      ready_servers: servers.filter(server => server.state === 'ready').length,
      servers,
      groups,
    };
  }

  getHealthDetails(): ConnectionHealthDetail[] {
    return [...this.connections.values()].map(connection => connection.getHealthDetail());
  }

  private partition(names: string[]): ResolvedTarget {
    const resolved: ResolvedTarget = { connections: [], unavailable: [] };
    for (const name of names) {
      const connection = this.connections.get(name);
      if (connection?.isReady()) {
        resolved.connections.push(connection);
      } else {
        resolved.unavailable.push(name);
      }
    }
    return resolved;
  }

  private async runHealthCheck(): Promise<HealthCheckReport> {
    const { failureThreshold, idleThresholdMs, probeTimeoutMs } = this.healthPolicy;
    const report: HealthCheckReport = { degraded: [], probed: [] };

    const checks = [...this.connections.values()]
      .filter(connection => connection.isReady())
      .map(async connection => {
        if (connection.failureCount >= failureThreshold) {
          connection.degrade(
            'error_threshold',
            `${connection.failureCount} consecutive transport failures`
          );
          report.degraded.push(connection.name);
          return;
        }

        if (connection.idleMs() < idleThresholdMs) {
          return;
        }

        report.probed.push(connection.name);
        const alive = await connection.probe(probeTimeoutMs);
        if (!alive && connection.isReady()) {
          connection.degrade('health_check_failed', `no ping response within ${probeTimeoutMs}ms`);
          report.degraded.push(connection.name);
        }
      });

    await Promise.all(checks);

    if (report.degraded.length > 0) {
      this.log.warn(`[manager] Health check degraded: ${report.degraded.join(', ')}`);
    }
    return report;
  }

  private createConnection(definition: ServerDefinition): StdioConnection {
    const connection = new StdioConnection(definition, this.connectionOptions, this.log);
    connection.on('reconnect-exhausted', () => {
      this.log.error(`[manager] ${definition.name} stays degraded after exhausting reconnects`);
    });
    return connection;
  }
}
