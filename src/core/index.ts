/**
 * Core control loop building blocks
 *
 * - plant: kiln thermal model (first-order lag, Euler, clamped)
 * - pid: PID controller with anti-windup and bumpless MANUAL -> AUTO transfer
 * - emissions: CO2 rate from control effort and temperature
 * - history: bounded, time-ordered sample store
 */

export * from './plant';
export * from './pid';
export * from './emissions';
export * from './history';
