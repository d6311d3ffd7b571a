import { z } from 'zod';
import { logger, type Logger } from '@switchboard/core';
import { FailureKinds, NO_TARGETS_KEY, type AggregatedResult } from '@switchboard/contracts';
import type { CommandTarget } from '@switchboard/protocol';
import { aggregate, failure, type CommandRouter } from './command-router.js';

const MAX_DESCRIPTION_LENGTH = 500;

const toolDescriptorSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_.\-/]+$/),
  description: z.string().optional(),
  inputSchema: z.record(z.unknown()).optional(),
});

const toolsListResultSchema = z.object({
  tools: z.array(z.unknown()),
});

export interface CatalogTool {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
  /** Server that provides the tool */
  server: string;
}

export interface CatalogRefreshReport {
  tools: number;
  servers: string[];
  failures: Record<string, string>;
  conflicts: Array<{ tool: string; kept: string; skipped: string }>;
}

/**
 * Tool Catalog
 *
 * Aggregates `tools/list` across every ready server and routes `tools/call`
 * to the server that owns a tool. On a name clash the first server in sorted
 * order wins.
 */
export class ToolCatalog {
  private tools = new Map<string, CatalogTool>();
  private readonly log: Logger;

  constructor(
    private readonly router: CommandRouter,
    log: Logger = logger
  ) {
    this.log = log.child({ component: 'catalog' });
  }

  async refresh(options: { timeoutMs?: number } = {}): Promise<CatalogRefreshReport> {
    const result = await this.router.dispatch(
      { method: 'tools/list' },
      { kind: 'broadcast' },
      options.timeoutMs !== undefined ? { perRequestTimeoutMs: options.timeoutMs } : {}
    );

    const tools = new Map<string, CatalogTool>();
    const report: CatalogRefreshReport = { tools: 0, servers: [], failures: {}, conflicts: [] };

    for (const server of Object.keys(result.outcomes).sort()) {
      const outcome = result.outcomes[server];
      if (!outcome || server === NO_TARGETS_KEY) {
        continue;
      }
      if (outcome.status !== 'success') {
        report.failures[server] =
          outcome.status === 'timed_out' ? `timed out after ${outcome.timeoutMs}ms` : outcome.message;
        continue;
      }

      const parsed = toolsListResultSchema.safeParse(outcome.payload);
      if (!parsed.success) {
        this.log.warn(`[catalog] Invalid tools/list reply from ${server}`);
        report.failures[server] = 'invalid tools/list reply';
        continue;
      }

      report.servers.push(server);
      for (const entry of parsed.data.tools) {
        const tool = toolDescriptorSchema.safeParse(entry);
        if (!tool.success) {
          this.log.warn(`[catalog] Skipping invalid tool from ${server}`);
          continue;
        }

        const { name, description, inputSchema } = tool.data;
        const existing = tools.get(name);
        if (existing) {
          this.log.warn(
            `[catalog] Tool name conflict: ${name} provided by both ${existing.server} and ${server}. ` +
              `Using ${existing.server}.`
          );
          report.conflicts.push({ tool: name, kept: existing.server, skipped: server });
          continue;
        }

        tools.set(name, {
          name,
          ...(description !== undefined
            ? { description: description.substring(0, MAX_DESCRIPTION_LENGTH) }
            : {}),
          inputSchema: inputSchema ?? { type: 'object' },
          server,
        });
      }
    }

    this.tools = tools;
    report.tools = tools.size;
    this.log.info(`[catalog] Aggregated ${tools.size} tools from ${report.servers.length} servers`);
    return report;
  }

  list(): CatalogTool[] {
    return [...this.tools.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  get(name: string): CatalogTool | undefined {
    return this.tools.get(name);
  }

  /**
   * Call a tool on the server that provides it
   */
  async invoke(
    toolName: string,
    args: Record<string, unknown> = {},
    options: { timeoutMs?: number } = {}
  ): Promise<AggregatedResult> {
    const command = { method: 'tools/call', params: { name: toolName, arguments: args } };
    const tool = this.tools.get(toolName);

    if (!tool) {
      const target: CommandTarget = { kind: 'broadcast' };
      return aggregate(
        command,
        target,
        new Map([[NO_TARGETS_KEY, failure(FailureKinds.UNKNOWN_TOOL, `Tool not found: ${toolName}`)]]),
        new Date()
      );
    }

    return this.router.dispatch(
      command,
      { kind: 'single', server: tool.server },
      options.timeoutMs !== undefined ? { perRequestTimeoutMs: options.timeoutMs } : {}
    );
  }
}
