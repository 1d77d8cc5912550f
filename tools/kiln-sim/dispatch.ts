/**
 * Apply a parsed client command to the driver and build the reply
 */

import type { SimulationDriver } from '../../src'

import { historyMessage, resolveHistoryLimit } from './protocol'
import type { ClientCommand, ServerMessage } from './types'

/**
 * @param historyLimit - Server-side cap on samples per history reply
 */
export function dispatchCommand(driver: SimulationDriver, command: ClientCommand, historyLimit: number): ServerMessage {
  switch (command.type) {
    case 'start':
      return { type: 'ack', command: command.type, status: driver.start() }
    case 'stop':
      return { type: 'ack', command: command.type, status: driver.stop() }
    case 'reset':
      return {
        type: 'ack',
        command: command.type,
        status: driver.reset({ restoreDefaultConfig: command.restoreDefaultConfig }),
      }
    case 'configure': {
      const result = driver.setConfig(command.patch)
      if (!result.ok) {
        return { type: 'error', error: `${result.condition}: ${result.errors.join('; ')}` }
      }
      return { type: 'ack', command: command.type, status: result.deferred ? 'DEFERRED' : 'APPLIED' }
    }
    case 'history':
      return historyMessage(driver.history(), resolveHistoryLimit(command, historyLimit))
  }
}
