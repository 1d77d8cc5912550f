#!/usr/bin/env node
/**
 * Headless Kiln Run
 * Runs N ticks as fast as possible and prints a summary
 */

import * as fs from 'node:fs'

import chalk from 'chalk'
import { Command, InvalidArgumentError } from 'commander'

import {
  CONFIG,
  assertValidConfig,
  assessClinker,
  efficiencyParametersFromConfig,
  estimateEfficiency,
  formatEfficiency,
  formatRunSummary,
  initialize,
  isControlMode,
  summaryOptionsFromConfig,
  trackRunSummary,
} from '../../src'
import type { ControlMode, KilnConfig } from '../../src'

import { getConfig } from './config'
import { describeCsvWindow, formatCsv } from './csv'

interface RunOptions {
  ticks: number
  dt?: number
  setpoint?: number
  kp?: number
  ki?: number
  kd?: number
  mode?: ControlMode
  manual?: number
  csv?: string
  verbose: boolean
}

function parseFiniteNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.')
  return parsed
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError('Not a positive integer.')
  return parsed
}

function parseMode(value: string): ControlMode {
  const upper = value.toUpperCase()
  if (!isControlMode(upper)) throw new InvalidArgumentError('Must be AUTO or MANUAL.')
  return upper
}

/**
 * Apply CLI flags on top of the default configuration
 */
function buildRunConfig(base: KilnConfig, options: RunOptions, dtSec: number): KilnConfig {
  return {
    ...base,
    TICK_DT_SEC: options.dt ?? dtSec,
    SETPOINT_C: options.setpoint ?? base.SETPOINT_C,
    KP: options.kp ?? base.KP,
    KI: options.ki ?? base.KI,
    KD: options.kd ?? base.KD,
    INITIAL_MODE: options.mode ?? base.INITIAL_MODE,
    MANUAL_OUTPUT_PCT: options.manual ?? base.MANUAL_OUTPUT_PCT,
    // Headless runs do not log per tick unless asked to
    GLOBAL_LOG_LEVEL: options.verbose ? base.LOG_LEVELS.DEBUG : base.LOG_LEVELS.WARNING,
    CONSOLE_LOG_LEVEL: options.verbose ? base.LOG_LEVELS.DEBUG : base.LOG_LEVELS.WARNING,
  }
}

/**
 * Reject bad flags with one readable line; initialize() prints warnings itself
 */
function checkSettings(config: KilnConfig): boolean {
  try {
    assertValidConfig(config)
    return true
  } catch (error) {
    console.error(chalk.red('Invalid settings:'), error instanceof Error ? error.message : String(error))
    return false
  }
}

function main(): void {
  const program = new Command()
    .name('kiln-run')
    .description('Run the kiln simulation headless and print a summary')
    .option('-n, --ticks <count>', 'Number of ticks to run', parsePositiveInteger, 3600)
    .option('--dt <seconds>', 'Simulated seconds per tick', parseFiniteNumber)
    .option('-s, --setpoint <celsius>', 'Temperature setpoint', parseFiniteNumber)
    .option('--kp <gain>', 'Proportional gain', parseFiniteNumber)
    .option('--ki <gain>', 'Integral gain', parseFiniteNumber)
    .option('--kd <gain>', 'Derivative gain', parseFiniteNumber)
    .option('-m, --mode <mode>', 'Controller mode (AUTO or MANUAL)', parseMode)
    .option('--manual <percent>', 'Output used in MANUAL mode', parseFiniteNumber)
    .option('--csv <file>', 'Write the sample history to a CSV file')
    .option('-v, --verbose', 'Log every tick at DEBUG level', false)
    .parse(process.argv)

  const options = program.opts<RunOptions>()
  const config = buildRunConfig(CONFIG, options, getConfig().dtSec)

  if (!checkSettings(config)) {
    process.exitCode = 1
    return
  }

  const app = initialize(config)
  if (!app) {
    process.exitCode = 1
    return
  }

  const { driver, logger } = app
  const summaryOptions = summaryOptionsFromConfig(config)
  // Fed from sample events, so it covers every tick even once history has wrapped
  const run = trackRunSummary(driver, summaryOptions)
  driver.start()

  let lastCondition: string | null = null
  for (let i = 0; i < options.ticks; i++) {
    const result = driver.tick(config.TICK_DT_SEC)
    if (!result.ok) {
      console.error(chalk.red(`Tick ${i + 1} failed: ${result.message}`))
      break
    }
    lastCondition = result.condition ?? lastCondition
  }
  driver.stop()
  logger.dispose()

  const summary = run.summary()
  if (!summary) {
    console.log(chalk.yellow('No samples recorded'))
    return
  }

  const quality = assessClinker(summary.finalTemperature, summaryOptions.quality)
  const efficiencyParams = efficiencyParametersFromConfig(config)
  const efficiency = estimateEfficiency(summary.averageFuelRateKgH, efficiencyParams)

  console.log('\n' + chalk.cyan('═'.repeat(60)))
  console.log(chalk.cyan.bold(`Kiln run: ${config.INITIAL_MODE}, sp=${config.SETPOINT_C}C, dt=${config.TICK_DT_SEC}s`))
  console.log(chalk.cyan('═'.repeat(60)))
  console.log(chalk.white(formatRunSummary(summary)))
  console.log(quality.quality === 'good' ? chalk.green(quality.label)
    : quality.quality === 'partial' ? chalk.yellow(quality.label)
      : chalk.red(quality.label))
  console.log((efficiency.annualFuelSavedKg >= 0 ? chalk.green : chalk.red)(formatEfficiency(efficiency, efficiencyParams)))
  if (lastCondition) {
    console.log(chalk.yellow(`Last condition: ${lastCondition}`))
  }

  if (options.csv) {
    const history = driver.history()
    fs.writeFileSync(options.csv, formatCsv(history))
    console.log(chalk.gray(`History written to ${options.csv} (${describeCsvWindow(history.length, summary.sampleCount)})`))
  }
  console.log(chalk.cyan('═'.repeat(60)) + '\n')
}

main()
