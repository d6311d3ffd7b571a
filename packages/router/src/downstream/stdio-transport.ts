import { ProtocolError, SwitchboardError, WriteError, type Logger } from '@switchboard/core';
import { parseIncomingMessage } from '@switchboard/contracts';
import type { IncomingMessage, OutgoingMessage } from '@switchboard/protocol';
import type { ChildHandle } from './types.js';

/**
 * System environment variables passed through to server processes. Anything
 * else must come from the definition's own `env`.
 */
export const SAFE_ENV_VARS = [
  'PATH',
  'HOME',
  'NODE_ENV',
  'LANG',
  'TZ',
  'TERM',
  'USER',
  'SHELL',
  'TMPDIR',
];

/**
 * Whitelisted variables from `source`, overlaid with the definition's env
 */
export function buildChildEnv(
  source: NodeJS.ProcessEnv,
  overrides: Record<string, string>
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of SAFE_ENV_VARS) {
    const value = source[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return { ...env, ...overrides };
}

/**
 * Mask tokens and passwords before stderr reaches the logs
 */
export function redactCredentials(text: string): string {
  return (
    text
      // API keys
      .replace(/sk-[a-zA-Z0-9]{20,}/g, 'sk-***REDACTED***')
      .replace(/sk_[a-z]+_[a-zA-Z0-9]{20,}/g, 'sk_***REDACTED***')
      // GitHub tokens
      .replace(/ghp_[a-zA-Z0-9]{36,}/g, 'ghp_***REDACTED***')
      .replace(/github_pat_[a-zA-Z0-9_]{82}/g, 'github_pat_***REDACTED***')
      .replace(/Bearer\s+[a-zA-Z0-9_\-.]+/gi, 'Bearer ***REDACTED***')
      // key=value and "key": "value"
      .replace(
        /(token|password|secret|key|apikey|api_key)[\s]*[:=][\s]*["']?[^\s"',}]+/gi,
        '$1=***REDACTED***'
      )
  );
}

export type TransportFrame =
  | { ok: true; message: IncomingMessage }
  | { ok: false; error: ProtocolError };

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface StdioTransportOptions {
  server: string;
  log: Logger;
  maxMessageBytes?: number;
  maxBufferBytes?: number;
  /** Longest stderr line kept, after redaction */
  maxStderrLineLength?: number;
  onStderr?: (line: string) => void;
  onProcessError?: (err: Error) => void;
  onExit?: (info: ExitInfo) => void;
}

/**
 * Newline-delimited JSON-RPC over a child's stdin/stdout
 *
 * One message per line, written with a single write call. stderr is drained
 * line by line into the debug log and never parsed.
 */
export class StdioTransport {
  static readonly MAX_BUFFER_SIZE = 10 * 1024 * 1024; // 10MB
  static readonly MAX_MESSAGE_SIZE = 1 * 1024 * 1024; // 1MB
  private static readonly MAX_STDERR_LINE = 500;

  readonly exited: Promise<ExitInfo>;

  private readonly server: string;
  private readonly log: Logger;
  private readonly maxMessageBytes: number;
  private readonly maxBufferBytes: number;
  private readonly maxStderrLine: number;
  private exitInfo: ExitInfo | null = null;
  private processError: Error | null = null;
  private writeClosed = false;
  private receiving = false;
  private stderrBuffer = '';
  private closing: Promise<void> | null = null;

  constructor(
    private readonly child: ChildHandle,
    private readonly options: StdioTransportOptions
  ) {
    this.server = options.server;
    this.log = options.log;
    this.maxMessageBytes = options.maxMessageBytes ?? StdioTransport.MAX_MESSAGE_SIZE;
    this.maxBufferBytes = options.maxBufferBytes ?? StdioTransport.MAX_BUFFER_SIZE;
    this.maxStderrLine = options.maxStderrLineLength ?? StdioTransport.MAX_STDERR_LINE;

    this.exited = new Promise(resolve => {
      child.once('exit', (code, signal) => {
        this.exitInfo = { code, signal };
        this.log.info(`[transport] Process exited: code=${code} signal=${signal}`);
        this.options.onExit?.({ code, signal });
        resolve({ code, signal });
      });
    });

    child.on('error', err => {
      this.processError = err;
      this.log.error({ err }, '[transport] Process error');
      this.options.onProcessError?.(err);
    });

    child.stdin?.on('error', err => {
      this.writeClosed = true;
      this.log.warn({ err }, '[transport] stdin error');
    });

    const stderr = child.stderr;
    if (stderr) {
      stderr.setEncoding('utf8');
      stderr.on('data', (chunk: string | Buffer) => this.handleStderr(String(chunk)));
      stderr.on('end', () => this.flushStderr());
      stderr.on('error', err => this.log.warn({ err }, '[transport] stderr error'));
    }
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /**
   * True once the process has exited or failed to start
   */
  get terminated(): boolean {
    return (
      this.exitInfo !== null ||
      this.child.exitCode !== null ||
      this.child.signalCode !== null ||
      (this.processError !== null && this.child.pid === undefined)
    );
  }

  /**
   * Serialize one message and write it as a single line
   *
   * @throws WriteError if stdin is closed or the write fails
   */
  async send(message: OutgoingMessage): Promise<void> {
    const stdin = this.child.stdin;
    if (!stdin || this.writeClosed || stdin.destroyed || stdin.writableEnded) {
      throw new WriteError(this.server, 'stdin is closed');
    }

    const line = JSON.stringify(message) + '\n';

    await new Promise<void>((resolve, reject) => {
      try {
        stdin.write(line, 'utf8', err => {
          if (err) {
            this.writeClosed = true;
            reject(new WriteError(this.server, err.message));
          } else {
            resolve();
          }
        });
      } catch (err) {
        this.writeClosed = true;
        reject(new WriteError(this.server, err instanceof Error ? err.message : String(err)));
      }
    });
  }

  /**
   * Frames from stdout, in arrival order, until end of stream
   *
   * Undecodable lines come through as `{ ok: false }` frames and the stream
   * continues. Only one consumer may iterate at a time.
   */
  async *receive(): AsyncGenerator<TransportFrame, void, undefined> {
    if (this.receiving) {
      throw new SwitchboardError(`[${this.server}] receive() is already being consumed`, 'receive_busy');
    }
    this.receiving = true;

    const stdout = this.child.stdout;
    if (!stdout) {
      return;
    }
    stdout.setEncoding('utf8');

    let buffer = '';
    try {
      for await (const chunk of stdout) {
        buffer += typeof chunk === 'string' ? chunk : String(chunk);

        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          const frame = this.decodeLine(line);
          if (frame) {
            yield frame;
          }
        }

        if (buffer.length > this.maxBufferBytes) {
          this.log.error(`[transport] Buffer exceeded ${this.maxBufferBytes} bytes, discarding`);
          buffer = '';
          yield {
            ok: false,
            error: new ProtocolError(this.server, `unterminated line exceeded ${this.maxBufferBytes} bytes`),
          };
        }
      }
    } catch (err) {
      this.log.warn({ err }, '[transport] stdout stream failed');
    }

    // A final line without a trailing newline still counts
    const frame = this.decodeLine(buffer);
    if (frame) {
      yield frame;
    }
  }

  /**
   * End stdin, then SIGTERM, then SIGKILL once the grace period runs out.
   * Safe to call more than once.
   */
  close(graceMs: number): Promise<void> {
    if (!this.closing) {
      this.closing = this.terminate(graceMs);
    }
    return this.closing;
  }

  private async terminate(graceMs: number): Promise<void> {
    this.writeClosed = true;
    const stdin = this.child.stdin;
    if (stdin && !stdin.destroyed && !stdin.writableEnded) {
      stdin.end();
    }

    if (this.terminated) {
      return;
    }

    this.child.kill('SIGTERM');
    if (await this.waitForExit(graceMs)) {
      return;
    }

    this.log.warn(`[transport] Process ignored SIGTERM for ${graceMs}ms, force killing`);
    this.child.kill('SIGKILL');
    await this.waitForExit(graceMs);
  }

  private waitForExit(ms: number): Promise<boolean> {
    if (this.terminated) {
      return Promise.resolve(true);
    }
    return new Promise(resolve => {
      const timer = setTimeout(() => resolve(false), ms);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private decodeLine(raw: string): TransportFrame | null {
    const line = raw.trim();
    if (line === '') {
      return null;
    }

    if (line.length > this.maxMessageBytes) {
      this.log.error(`[transport] Message exceeded ${this.maxMessageBytes} bytes, discarding`);
      return {
        ok: false,
        error: new ProtocolError(this.server, `message exceeded ${this.maxMessageBytes} bytes`),
      };
    }

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { ok: false, error: new ProtocolError(this.server, `invalid JSON: ${reason}`, line.slice(0, 200)) };
    }

    const parsed = parseIncomingMessage(value);
    if (!parsed.success) {
      return { ok: false, error: new ProtocolError(this.server, parsed.error, line.slice(0, 200)) };
    }
    return { ok: true, message: parsed.message };
  }

  private handleStderr(chunk: string): void {
    this.stderrBuffer += chunk;
    const lines = this.stderrBuffer.split('\n');
    this.stderrBuffer = lines.pop() ?? '';
    for (const line of lines) {
      this.emitStderrLine(line);
    }
    if (this.stderrBuffer.length > this.maxStderrLine) {
      this.emitStderrLine(this.stderrBuffer);
      this.stderrBuffer = '';
    }
  }

  private flushStderr(): void {
    if (this.stderrBuffer !== '') {
      this.emitStderrLine(this.stderrBuffer);
      this.stderrBuffer = '';
    }
  }

  private emitStderrLine(raw: string): void {
    const line = raw.trimEnd();
    if (line === '') {
      return;
    }
    const redacted = redactCredentials(line);
    const truncated =
      redacted.length > this.maxStderrLine
        ? redacted.substring(0, this.maxStderrLine) + '... (truncated)'
        : redacted;

    this.log.debug({ stderr: truncated }, '[transport] stderr');
    this.options.onStderr?.(truncated);
  }
}
