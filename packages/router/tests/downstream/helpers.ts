import { EventEmitter } from 'events'
import { PassThrough } from 'stream'
import type { SpawnOptions } from 'child_process'
import { parseServerDefinition, type ServerDefinition } from '@switchboard/core'
import type { JsonRpcRequest } from '@switchboard/protocol'
import type { ChildHandle, ConnectionOptions, SpawnFn } from '../../src/downstream/index.js'

let counter = 0

export function makeDefinition(overrides: Partial<Record<keyof ServerDefinition, unknown>> = {}): ServerDefinition {
  counter++
  return parseServerDefinition({
    name: `server-${counter}`,
    command: 'node',
    args: ['./server.js'],
    ...overrides,
  })
}

/**
 * Child process stand-in: stdio are PassThrough streams, kill() exits
 */
export class FakeChild extends EventEmitter implements ChildHandle {
  readonly stdin = new PassThrough()
  readonly stdout = new PassThrough()
  readonly stderr = new PassThrough()
  readonly pid: number | undefined
  exitCode: number | null = null
  signalCode: NodeJS.Signals | null = null
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = []
  ignoreSigterm = false

  /** `null` models a process that never started */
  constructor(pid: number | null = 4242) {
    super()
    this.pid = pid ?? undefined
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal)
    if (this.exited) {
      return false
    }
    if (this.ignoreSigterm && (signal === undefined || signal === 'SIGTERM')) {
      return true
    }
    this.exit(null, typeof signal === 'string' ? signal : 'SIGTERM')
    return true
  }

  get exited(): boolean {
    return this.exitCode !== null || this.signalCode !== null
  }

  /** Simulate the process ending: closes its output streams, then emits exit */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return
    }
    this.exitCode = code
    this.signalCode = signal
    if (!this.stdout.writableEnded) this.stdout.end()
    if (!this.stderr.writableEnded) this.stderr.end()
    this.emit('exit', code, signal)
  }
}

type RequestHandler = (request: JsonRpcRequest, server: FakeServer) => void

/**
 * Scripted peer on the other end of a FakeChild
 */
export class FakeServer {
  readonly requests: JsonRpcRequest[] = []
  readonly notifications: Array<{ method: string; params?: unknown }> = []
  private buffer = ''
  private handler: RequestHandler | null = null

  constructor(readonly child: FakeChild) {
    child.stdin.setEncoding('utf8')
    child.stdin.on('data', (chunk: string) => this.onData(chunk))
  }

  /** Answer every incoming request with `handler` */
  onRequest(handler: RequestHandler): this {
    this.handler = handler
    return this
  }

  /** Reply to every request with `{ echo: method, params }` */
  echo(): this {
    return this.onRequest((request, server) =>
      server.respond(request.id, { echo: request.method, params: request.params })
    )
  }

  sendReady(server = 'fake'): void {
    this.send({ jsonrpc: '2.0', method: 'ready', id: 'init', params: { server } })
  }

  respond(id: number, result: unknown): void {
    this.send({ jsonrpc: '2.0', id, result })
  }

  respondError(id: number, code: number, message: string, data?: unknown): void {
    this.send({ jsonrpc: '2.0', id, error: data === undefined ? { code, message } : { code, message, data } })
  }

  notify(method: string, params?: unknown): void {
    this.send({ jsonrpc: '2.0', method, ...(params !== undefined ? { params } : {}) })
  }

  send(message: unknown): void {
    this.writeRaw(JSON.stringify(message) + '\n')
  }

  writeRaw(text: string): void {
    if (!this.child.stdout.writableEnded) {
      this.child.stdout.write(text)
    }
  }

  writeStderr(text: string): void {
    this.child.stderr.write(text)
  }

  /** Resolves once `count` requests have arrived */
  async waitForRequests(count: number): Promise<JsonRpcRequest[]> {
    while (this.requests.length < count) {
      await new Promise(resolve => setTimeout(resolve, 2))
    }
    return this.requests.slice(0, count)
  }

  private onData(chunk: string): void {
    this.buffer += chunk
    const lines = this.buffer.split('\n')
    this.buffer = lines.pop() ?? ''
    for (const line of lines) {
      if (!line.trim()) continue
      const message: unknown = JSON.parse(line)
      if (!isRecord(message) || typeof message.method !== 'string') continue
      if (typeof message.id === 'number') {
        const request: JsonRpcRequest = {
          jsonrpc: '2.0',
          id: message.id,
          method: message.method,
          ...(message.params !== undefined ? { params: message.params } : {}),
        }
        this.requests.push(request)
        this.handler?.(request, this)
      } else {
        this.notifications.push({ method: message.method, params: message.params })
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export interface SpawnCall {
  command: string
  args: readonly string[]
  options: SpawnOptions
}

/**
 * A SpawnFn that hands out FakeChild processes. `setup` scripts each new
 * server (the default sends ready and echoes requests).
 */
export function fakeSpawner(
  setup: (server: FakeServer, index: number, command: string) => void = server => {
    server.echo().sendReady()
  }
): { spawn: SpawnFn; servers: FakeServer[]; calls: SpawnCall[] } {
  const servers: FakeServer[] = []
  const calls: SpawnCall[] = []

  const spawn: SpawnFn = (command, args, options) => {
    const child = new FakeChild(4000 + servers.length)
    const server = new FakeServer(child)
    calls.push({ command, args, options })
    servers.push(server)
    setup(server, servers.length - 1, command)
    return child
  }

  return { spawn, servers, calls }
}

/** Fast timings for tests; reconnects disabled unless a test opts in */
export function testOptions(overrides: Partial<ConnectionOptions> = {}): Partial<ConnectionOptions> {
  return {
    handshakeTimeoutMs: 200,
    requestTimeoutMs: 1000,
    shutdownGraceMs: 50,
    random: () => 0,
    reconnect: { baseDelayMs: 5, maxDelayMs: 1000, maxAttempts: 0, jitterRatio: 0.2 },
    ...overrides,
  }
}

export async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const start = Date.now()
  while (!condition()) {
    if (Date.now() - start > timeoutMs) {
      throw new Error('condition not met in time')
    }
    await new Promise(resolve => setTimeout(resolve, 2))
  }
}
