/**
 * Tests for command dispatch against a real driver
 */

import { CONFIG, buildDriverOptions, createLogger, createSimulationDriver } from '../../src'
import type { SimulationDriver } from '../../src'

import { dispatchCommand } from './dispatch'

function createDriver(): SimulationDriver {
  const logger = createLogger(
    { level: CONFIG.LOG_LEVELS.CRITICAL, demoteHours: 0 },
    { timeSource: () => 0, sinks: [] },
    CONFIG.LOG_LEVELS,
  )
  return createSimulationDriver(buildDriverOptions(CONFIG), { logger })
}

describe('dispatchCommand', () => {
  let driver: SimulationDriver

  beforeEach(() => {
    driver = createDriver()
  })

  it('should acknowledge lifecycle commands with the driver status', () => {
    expect(dispatchCommand(driver, { type: 'start' }, 10)).toEqual({ type: 'ack', command: 'start', status: 'APPLIED' })
    expect(dispatchCommand(driver, { type: 'start' }, 10)).toEqual({ type: 'ack', command: 'start', status: 'NO_OP' })
    expect(dispatchCommand(driver, { type: 'stop' }, 10)).toEqual({ type: 'ack', command: 'stop', status: 'APPLIED' })
    expect(driver.getPhase()).toBe('STOPPED')
  })

  it('should reset and optionally restore the default config', () => {
    driver.setConfig({ setpoint: 1400 })

    dispatchCommand(driver, { type: 'reset', restoreDefaultConfig: true }, 10)

    expect(driver.getPhase()).toBe('IDLE')
    expect(driver.getConfig().setpoint).toBe(CONFIG.SETPOINT_C)
  })

  it('should apply a valid patch', () => {
    expect(dispatchCommand(driver, { type: 'configure', patch: { mode: 'MANUAL' } }, 10)).toEqual({
      type: 'ack',
      command: 'configure',
      status: 'APPLIED',
    })
    expect(driver.getConfig().mode).toBe('MANUAL')
  })

  it('should report an invalid patch as an error', () => {
    expect(dispatchCommand(driver, { type: 'configure', patch: { gains: { kp: -1 } } }, 10)).toEqual({
      type: 'error',
      error: 'INVALID_CONFIG: kp must be a non-negative finite number, got -1',
    })
  })

  it('should return at most the allowed number of samples', () => {
    driver.start()
    for (let i = 0; i < 5; i++) driver.tick(1)

    const reply = dispatchCommand(driver, { type: 'history', limit: null }, 3)

    expect(reply.type).toBe('history')
    if (reply.type === 'history') {
      expect(reply.samples.map((s) => s.tick)).toEqual([3, 4, 5])
    }
  })
})
