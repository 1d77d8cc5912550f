#!/usr/bin/env node
/**
 * Kiln Live-State Server entry
 * Runs the simulation in real time and streams state over WebSocket
 */

import chalk from 'chalk'
import { Command } from 'commander'

import { CONFIG, createNodeTimer, initialize } from '../../src'
import type { KilnApp, KilnConfig } from '../../src'

import { getConfig } from './config'
import { KilnStateServer } from './server'
import type { ToolConfig } from './types'

function serve(app: KilnApp, toolConfig: ToolConfig, paused: boolean): void {
  const server = new KilnStateServer(app, toolConfig, createNodeTimer(false))
  let stopping = false

  const stop = (): void => {
    if (stopping) {
      console.log(chalk.red('[SERVER] Forced exit'))
      process.exit(1)
    }
    stopping = true
    console.log(chalk.yellow('\n[SERVER] Shutting down...'))
    server.shutdown().then(() => {
      app.logger.dispose()
      console.log(chalk.gray('[SERVER] Stopped'))
    }, (error: unknown) => {
      console.error(chalk.red('[SERVER] Shutdown failed:'), String(error))
      process.exit(1)
    })
  }

  process.on('SIGINT', stop)
  process.on('SIGTERM', stop)

  server.start().then((port) => {
    console.log(chalk.green(`[SERVER] ✓ Listening on ws://${toolConfig.host}:${port} (Ctrl+C to stop)`))
    if (!paused) app.driver.start()
  }, (error: unknown) => {
    console.error(chalk.red('WebSocket server error:'), error instanceof Error ? error.message : String(error))
    app.logger.dispose()
    process.exitCode = 1
    process.off('SIGINT', stop)
    process.off('SIGTERM', stop)
  })
}

function main(): void {
  const program = new Command()
    .name('kiln-serve')
    .description('Run the kiln simulation in real time and stream state over WebSocket')
    .option('--paused', 'Wait for a start command instead of starting immediately', false)
    .parse(process.argv)

  const { paused } = program.opts<{ paused: boolean }>()
  const toolConfig = getConfig()
  const config: KilnConfig = {
    ...CONFIG,
    TICK_DT_SEC: toolConfig.dtSec,
    TICK_PERIOD_MS: toolConfig.tickPeriodMs,
    GLOBAL_LOG_LEVEL: toolConfig.logLevel,
    CONSOLE_LOG_LEVEL: toolConfig.logLevel,
  }

  const app = initialize(config, {
    onReady: (ready) => serve(ready, toolConfig, paused),
  })
  if (!app) process.exitCode = 1
}

main()
