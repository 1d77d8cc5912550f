/**
 * Tests for the live-state server over a real loopback socket
 */

import WebSocket from 'ws'
import type { Mock } from 'vitest'

import { CONFIG, buildDriverOptions, createLogger, createSimulationDriver } from '../../src'
import type { KilnApp, TimerAPI, TimerHandle } from '../../src'

import { CLOSE_GOING_AWAY, CLOSE_GRACE_MS, KilnStateServer, MAX_PAYLOAD_BYTES } from './server'
import type { ServerMessage, ToolConfig } from './types'

interface FakeTimer {
  api: TimerAPI
  set: Mock<TimerAPI['set']>
  clear: Mock<TimerAPI['clear']>
  /** Run the callback registered under a handle */
  fire(handle: TimerHandle): void
}

function createFakeTimer(): FakeTimer {
  const callbacks = new Map<TimerHandle, () => void>()
  let nextHandle = 1
  const set = vi.fn<TimerAPI['set']>((_ms, _repeat, callback) => {
    const handle = nextHandle++
    callbacks.set(handle, callback)
    return handle
  })
  const clear = vi.fn<TimerAPI['clear']>((handle) => {
    callbacks.delete(handle)
  })
  return {
    api: { set, clear },
    set,
    clear,
    fire: (handle) => callbacks.get(handle)?.(),
  }
}

function createApp(lines: string[]): KilnApp {
  const logger = createLogger(
    { level: CONFIG.LOG_LEVELS.WARNING, demoteHours: 0 },
    { timeSource: () => 0, sinks: [{ sink: { write: (line) => lines.push(line) }, minLevel: CONFIG.LOG_LEVELS.WARNING }] },
    CONFIG.LOG_LEVELS,
  )
  return { config: CONFIG, logger, driver: createSimulationDriver(buildDriverOptions(CONFIG), { logger }) }
}

const TOOL_CONFIG: ToolConfig = {
  host: '127.0.0.1',
  port: 0,
  tickPeriodMs: 1000,
  dtSec: 1,
  logLevel: CONFIG.LOG_LEVELS.WARNING,
  historyLimit: 10,
}

interface TestClient {
  ws: WebSocket
  next(): Promise<ServerMessage>
  /** Resolves with the close code */
  closed: Promise<number>
}

function connect(port: number): Promise<TestClient> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}`)
  const inbox: ServerMessage[] = []
  const waiting: Array<(message: ServerMessage) => void> = []

  ws.on('message', (data) => {
    const message: ServerMessage = JSON.parse(String(data))
    const waiter = waiting.shift()
    if (waiter) waiter(message)
    else inbox.push(message)
  })
  const closed = new Promise<number>((resolve) => {
    ws.on('close', (code) => resolve(code))
  })

  const next = (): Promise<ServerMessage> => {
    const queued = inbox.shift()
    if (queued) return Promise.resolve(queued)
    return new Promise((resolve) => waiting.push(resolve))
  }

  return new Promise((resolve, reject) => {
    ws.once('open', () => {
      ws.off('error', reject)
      // The server may drop the connection mid-write; the close code is what tests assert
      ws.on('error', () => undefined)
      resolve({ ws, next, closed })
    })
    ws.once('error', reject)
  })
}

describe('KilnStateServer', () => {
  let lines: string[]
  let app: KilnApp
  let timer: FakeTimer
  let server: KilnStateServer
  let port: number

  beforeEach(async () => {
    lines = []
    app = createApp(lines)
    timer = createFakeTimer()
    server = new KilnStateServer(app, TOOL_CONFIG, timer.api)
    port = await server.start()
  })

  afterEach(async () => {
    await server.shutdown()
  })

  it('should listen on an ephemeral port and start the tick scheduler', () => {
    expect(port).toBeGreaterThan(0)
    expect(timer.set).toHaveBeenCalledWith(1000, true, expect.any(Function))
  })

  it('should send the current state to a new client', async () => {
    const client = await connect(port)

    const message = await client.next()

    expect(message.type).toBe('state')
    if (message.type !== 'state') return
    expect(message.state.tick).toBe(0)
    expect(message.state.phase).toBe('IDLE')
    expect(message.state.temperature).toBe(CONFIG.INITIAL_TEMPERATURE_C)
  })

  it('should broadcast state on each scheduled tick', async () => {
    const client = await connect(port)
    await client.next()
    app.driver.start()
    await client.next()

    timer.fire(1)
    const message = await client.next()

    expect(message.type).toBe('state')
    if (message.type !== 'state') return
    expect(message.state.tick).toBe(1)
    expect(message.state.time).toBe(1)
    expect(message.state.phase).toBe('RUNNING')
  })

  it('should answer a command after broadcasting the state change it caused', async () => {
    const client = await connect(port)
    await client.next()

    client.ws.send(JSON.stringify({ type: 'start' }))
    const broadcast = await client.next()
    const reply = await client.next()

    expect(broadcast.type).toBe('state')
    if (broadcast.type !== 'state') return
    expect(broadcast.state.phase).toBe('RUNNING')
    expect(reply).toEqual({ type: 'ack', command: 'start', status: 'APPLIED' })
  })

  it('should reply with an error to malformed JSON and keep the connection', async () => {
    const client = await connect(port)
    await client.next()

    client.ws.send('{not json')
    const reply = await client.next()
    client.ws.send(JSON.stringify({ type: 'stop' }))
    const ack = await client.next()

    expect(reply).toEqual({ type: 'error', error: 'invalid JSON' })
    expect(ack).toEqual({ type: 'ack', command: 'stop', status: 'NO_OP' })
  })

  it('should close an oversized message with 1009 and keep serving other clients', async () => {
    const client = await connect(port)
    await client.next()

    client.ws.send('x'.repeat(MAX_PAYLOAD_BYTES + 1))
    const code = await client.closed

    expect(code).toBe(1009)
    expect(lines).toContain('⚠️ [WARNING]  Client error: Max payload size exceeded')

    const other = await connect(port)
    const message = await other.next()
    expect(message.type).toBe('state')
  })

  it('should close open clients with 1001 on shutdown and resolve once they are gone', async () => {
    const first = await connect(port)
    const second = await connect(port)

    await server.shutdown()

    await expect(first.closed).resolves.toBe(CLOSE_GOING_AWAY)
    await expect(second.closed).resolves.toBe(CLOSE_GOING_AWAY)
    expect(timer.set).toHaveBeenCalledWith(CLOSE_GRACE_MS, false, expect.any(Function))
    // Scheduler handle 1, grace handle 2; both cleared
    expect(timer.clear.mock.calls.map((call) => call[0])).toEqual([1, 2])
    expect(app.driver.getPhase()).toBe('IDLE')
  })

  it('should return the same promise for repeated shutdowns', () => {
    const first = server.shutdown()

    expect(server.shutdown()).toBe(first)
  })
})
