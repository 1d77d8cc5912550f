/**
 * Kiln Live-State Server
 * Drives the simulation from a tick scheduler and streams state to WebSocket clients
 */

import { WebSocketServer } from 'ws'
import type { RawData, WebSocket } from 'ws'

import {
  EVENT_NAMES,
  assessClinker,
  createTickScheduler,
  rotationAngle,
} from '../../src'
import type {
  KilnApp,
  KilnConditionEvent,
  KilnLifecycleEvent,
  KilnSampleEvent,
  SimulationState,
  TickScheduler,
  TimerAPI,
  TimerHandle,
} from '../../src'

import { dispatchCommand } from './dispatch'
import { parseCommand, serialize, stateMessage } from './protocol'
import type { ServerMessage, ToolConfig } from './types'

/** Commands are a few hundred bytes; anything far larger is refused with 1009 */
export const MAX_PAYLOAD_BYTES = 64 * 1024

/** Close code sent to every client on shutdown */
export const CLOSE_GOING_AWAY = 1001

/** How long clients get to finish the close handshake before being terminated */
export const CLOSE_GRACE_MS = 2000

function rawToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
  return data.toString('utf8')
}

export class KilnStateServer {
  private wss?: WebSocketServer
  private scheduler: TickScheduler
  private closing?: Promise<void>

  private readonly onSample = (event: KilnSampleEvent): void => {
    this.broadcast(this.describe(event.state))
  }

  private readonly onLifecycle = (_event: KilnLifecycleEvent): void => {
    this.broadcast(this.describe(this.app.driver.currentState()))
  }

  private readonly onCondition = (event: KilnConditionEvent): void => {
    this.broadcast({
      type: 'condition',
      condition: event.condition,
      message: event.message,
      tick: event.tick,
    })
  }

  constructor(private app: KilnApp, private toolConfig: ToolConfig, private timerApi: TimerAPI) {
    const config = app.config
    this.scheduler = createTickScheduler(timerApi, app.driver, {
      periodMs: toolConfig.tickPeriodMs,
      dtSec: toolConfig.dtSec,
    }, app.logger, {
      logIntervalSec: config.PERF_LOG_INTERVAL_SEC,
      slowThresholdMs: config.PERF_SLOW_TICK_THRESHOLD_MS,
      warnSlowTicks: config.PERF_WARN_SLOW_TICKS,
      initialTickTimeMin: config.INITIAL_TICK_TIME_MIN,
    })
  }

  /**
   * Listen and start ticking
   * @returns The bound port (useful when the configured port is 0)
   */
  start(): Promise<number> {
    const { driver } = this.app
    driver.on(EVENT_NAMES.SAMPLE, this.onSample)
    driver.on(EVENT_NAMES.LIFECYCLE, this.onLifecycle)
    driver.on(EVENT_NAMES.CONDITION, this.onCondition)

    const wss = new WebSocketServer({
      host: this.toolConfig.host,
      port: this.toolConfig.port,
      maxPayload: MAX_PAYLOAD_BYTES,
    })
    this.wss = wss
    wss.on('connection', (ws) => this.onConnection(ws))

    return new Promise((resolve, reject) => {
      wss.once('error', reject)
      wss.once('listening', () => {
        wss.off('error', reject)
        wss.on('error', (error: Error) => {
          this.app.logger.warning(`WebSocket server error: ${error.message}`)
        })
        this.scheduler.start()
        const address = wss.address()
        resolve(typeof address === 'string' ? this.toolConfig.port : address.port)
      })
    })
  }

  /**
   * Stop ticking, close every client with 1001 and stop listening.
   * Clients that ignore the close handshake are terminated after CLOSE_GRACE_MS.
   * Repeated calls return the same promise.
   */
  shutdown(): Promise<void> {
    if (this.closing) return this.closing

    this.scheduler.stop()
    const { driver } = this.app
    driver.off(EVENT_NAMES.SAMPLE, this.onSample)
    driver.off(EVENT_NAMES.LIFECYCLE, this.onLifecycle)
    driver.off(EVENT_NAMES.CONDITION, this.onCondition)
    driver.stop()

    const wss = this.wss
    this.closing = new Promise((resolve) => {
      if (!wss) {
        resolve()
        return
      }

      for (const client of wss.clients) {
        client.close(CLOSE_GOING_AWAY, 'server shutting down')
      }
      const grace: TimerHandle = this.timerApi.set(CLOSE_GRACE_MS, false, () => {
        for (const client of wss.clients) {
          client.terminate()
        }
      })
      // Fires once the listener is down and the last client has gone
      wss.close(() => {
        this.timerApi.clear(grace)
        resolve()
      })
    })
    return this.closing
  }

  private onConnection(ws: WebSocket): void {
    this.app.logger.info('Client connected')
    ws.send(serialize(this.describe(this.app.driver.currentState())))

    ws.on('message', (data: RawData) => {
      const parsed = parseCommand(rawToText(data))
      const reply: ServerMessage = parsed.ok
        ? dispatchCommand(this.app.driver, parsed.command, this.toolConfig.historyLimit)
        : { type: 'error', error: parsed.error }
      if (ws.readyState === ws.OPEN) {
        ws.send(serialize(reply))
      }
    })

    // Bad frames and oversized messages surface here; ws closes the socket itself
    ws.on('error', (error: Error) => {
      this.app.logger.warning(`Client error: ${error.message}`)
    })

    ws.on('close', (code: number) => this.app.logger.info(`Client disconnected (code: ${code})`))
  }

  private describe(state: SimulationState): ServerMessage {
    const config = this.app.config
    return stateMessage(
      state,
      rotationAngle(state.time, config.KILN_MOTOR_RPM),
      assessClinker(state.temperature, { goodC: config.QUALITY_GOOD_C, partialC: config.QUALITY_PARTIAL_C }).label,
    )
  }

  private broadcast(message: ServerMessage): void {
    if (!this.wss) return
    const text = serialize(message)
    for (const client of this.wss.clients) {
      if (client.readyState === client.OPEN) {
        client.send(text)
      }
    }
  }
}
