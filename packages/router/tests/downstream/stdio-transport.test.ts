import { describe, it, expect } from 'vitest'
import { logger, ProtocolError, WriteError } from '@switchboard/core'
import {
  StdioTransport,
  buildChildEnv,
  redactCredentials,
  type StdioTransportOptions,
  type TransportFrame,
} from '../../src/downstream/index.js'
import { FakeChild, waitFor } from './helpers.js'

function makeTransport(child: FakeChild, options: Partial<StdioTransportOptions> = {}): StdioTransport {
  return new StdioTransport(child, { server: 'files', log: logger, ...options })
}

async function collect(transport: StdioTransport): Promise<TransportFrame[]> {
  const frames: TransportFrame[] = []
  for await (const frame of transport.receive()) {
    frames.push(frame)
  }
  return frames
}

function errorOf(frame: TransportFrame | undefined): ProtocolError {
  if (!frame || frame.ok) {
    throw new Error('expected an error frame')
  }
  return frame.error
}

const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve))

describe('StdioTransport send', () => {
  it('writes one newline-terminated line per message', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)
    let written = ''
    child.stdin.setEncoding('utf8')
    child.stdin.on('data', (chunk: string) => {
      written += chunk
    })

    await transport.send({ jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} })
    await transport.send({ jsonrpc: '2.0', method: 'cancelled', params: { id: 1 } })
    await flush()

    expect(written).toBe(
      '{"jsonrpc":"2.0","id":1,"method":"tools/list","params":{}}\n' +
        '{"jsonrpc":"2.0","method":"cancelled","params":{"id":1}}\n'
    )
  })

  it('rejects with WriteError once stdin is closed', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)
    child.stdin.end()

    await expect(transport.send({ jsonrpc: '2.0', id: 1, method: 'ping' })).rejects.toBeInstanceOf(WriteError)
    await expect(transport.send({ jsonrpc: '2.0', id: 2, method: 'ping' })).rejects.toThrow(
      '[files] Write failed: stdin is closed'
    )
  })
})

describe('StdioTransport receive', () => {
  it('reassembles messages split across chunks and skips blank lines', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)

    child.stdout.write('{"jsonrpc":"2.0","id":1,"res')
    child.stdout.write('ult":{"ok":true}}\n\n{"jsonrpc":"2.0","method":"progress"}\r\n')
    child.stdout.end()

    expect(await collect(transport)).toEqual([
      { ok: true, message: { jsonrpc: '2.0', id: 1, result: { ok: true } } },
      { ok: true, message: { jsonrpc: '2.0', method: 'progress' } },
    ])
  })

  it('reports undecodable lines and keeps reading', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)

    child.stdout.write('not json\n{"jsonrpc":"2.0","id":2,"result":null}\n{"foo":1}\n')
    child.stdout.end()

    const frames = await collect(transport)

    expect(frames).toHaveLength(3)
    expect(errorOf(frames[0]).message).toMatch(/^\[files\] Protocol error: invalid JSON/)
    expect(errorOf(frames[0]).line).toBe('not json')
    expect(frames[1]).toEqual({ ok: true, message: { jsonrpc: '2.0', id: 2, result: null } })
    expect(errorOf(frames[2]).message).toBe(
      '[files] Protocol error: message has neither result, error nor method'
    )
  })

  it('decodes error responses', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)

    child.stdout.write('{"jsonrpc":"2.0","id":4,"error":{"code":-32601,"message":"Method not found"}}\n')
    child.stdout.end()

    expect(await collect(transport)).toEqual([
      {
        ok: true,
        message: { jsonrpc: '2.0', id: 4, error: { code: -32601, message: 'Method not found' } },
      },
    ])
  })

  it('discards messages over the size limit', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child, { maxMessageBytes: 10 })

    child.stdout.write('{"jsonrpc":"2.0","id":1,"result":"xxxxxxxx"}\n')
    child.stdout.end()

    const frames = await collect(transport)
    expect(frames).toHaveLength(1)
    expect(errorOf(frames[0]).message).toBe('[files] Protocol error: message exceeded 10 bytes')
  })

  it('delivers a final line that has no trailing newline', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)

    child.stdout.write('{"jsonrpc":"2.0","id":3,"result":1}')
    child.stdout.end()

    expect(await collect(transport)).toEqual([{ ok: true, message: { jsonrpc: '2.0', id: 3, result: 1 } }])
  })

  it('allows a single consumer', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)

    const first = transport.receive()
    const pending = first.next()

    await expect(transport.receive().next()).rejects.toThrow('receive() is already being consumed')

    child.stdout.end()
    expect(await pending).toEqual({ done: true, value: undefined })
  })
})

describe('StdioTransport stderr', () => {
  it('forwards stderr lines with credentials redacted', async () => {
    const child = new FakeChild()
    const lines: string[] = []
    makeTransport(child, { onStderr: line => lines.push(line) })

    child.stderr.write('starting up\nusing token=test-secret now\n')
    await waitFor(() => lines.length === 2)

    expect(lines).toEqual(['starting up', 'using token=***REDACTED*** now'])
  })

  it('truncates long stderr lines', async () => {
    const child = new FakeChild()
    const lines: string[] = []
    makeTransport(child, { onStderr: line => lines.push(line), maxStderrLineLength: 5 })

    child.stderr.write('abcdefgh\n')
    await waitFor(() => lines.length === 1)

    expect(lines).toEqual(['abcde... (truncated)'])
  })

  it('redacts common credential formats', () => {
    expect(redactCredentials('Authorization: Bearer abc.def-ghi')).toBe('Authorization: Bearer ***REDACTED***')
    expect(redactCredentials('api sk-aaaaaaaaaaaaaaaaaaaaaaaa')).toBe('api sk-***REDACTED***')
    expect(redactCredentials('login password: hunter2')).toBe('login password=***REDACTED***')
  })
})

describe('StdioTransport close', () => {
  it('ends stdin and sends SIGTERM', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)

    await transport.close(50)

    expect(child.stdin.writableEnded).toBe(true)
    expect(child.killSignals).toEqual(['SIGTERM'])
    expect(await transport.exited).toEqual({ code: null, signal: 'SIGTERM' })
  })

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const child = new FakeChild()
    child.ignoreSigterm = true
    const transport = makeTransport(child)

    await transport.close(20)

    expect(child.killSignals).toEqual(['SIGTERM', 'SIGKILL'])
    expect(transport.terminated).toBe(true)
  })

  it('does not signal a process that has already exited', async () => {
    const child = new FakeChild()
    const transport = makeTransport(child)
    child.exit(0)

    await transport.close(20)

    expect(child.killSignals).toEqual([])
  })
})

describe('buildChildEnv', () => {
  it('passes only whitelisted variables plus the definition env', () => {
    const env = buildChildEnv(
      { PATH: '/usr/bin', HOME: '/home/test', SHOULD_NOT_PASS: 'bad' },
      { API_TOKEN: 'test-secret', PATH: '/opt/bin' }
    )

    expect(env).toEqual({ PATH: '/opt/bin', HOME: '/home/test', API_TOKEN: 'test-secret' })
  })
})
