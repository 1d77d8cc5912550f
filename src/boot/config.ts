import type { KilnUserConfig, KilnAppConstants, KilnConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for control,
//   plant behaviour, reporting, and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<KilnUserConfig> = {
  // SETPOINT_C
  //   Role: Target burning-zone temperature in °C.
  //   Critical: Within [AMBIENT_TEMPERATURE_C, MAX_TEMPERATURE_C].
  //   Recommended: 1350–1450 °C; clinker forms properly around 1400 °C.
  SETPOINT_C: 1350,

  // KP / KI / KD
  //   Role: PID gains (output % per °C, per °C·s, per °C/s).
  //   Critical: Finite and ≥ 0.
  //   Recommended: KP ≈ 1, KI ≈ 0.1, KD = 0; the slow kiln lag rarely needs derivative action.
  KP: 1.0,
  KI: 0.1,
  KD: 0,

  // OUTPUT_MIN_PCT / OUTPUT_MAX_PCT
  //   Role: Limits of the controller output (fuel/heat input in %).
  //   Critical: 0–100 %, OUTPUT_MIN_PCT ≤ OUTPUT_MAX_PCT.
  //   Recommended: 0 / 100.
  OUTPUT_MIN_PCT: 0,
  OUTPUT_MAX_PCT: 100,

  // MANUAL_OUTPUT_PCT
  //   Role: Output applied while in MANUAL mode.
  //   Critical: 0–100 %.
  //   Recommended: Inside [OUTPUT_MIN_PCT, OUTPUT_MAX_PCT] (clamped otherwise).
  MANUAL_OUTPUT_PCT: 50,

  // INITIAL_MODE
  //   Role: Controller mode at start-up and after a default reset.
  //   Critical: 'AUTO' or 'MANUAL'.
  //   Recommended: 'AUTO'.
  INITIAL_MODE: 'AUTO',

  // INITIAL_TEMPERATURE_C
  //   Role: Kiln temperature at time zero (restored on reset).
  //   Critical: Within [AMBIENT_TEMPERATURE_C, MAX_TEMPERATURE_C].
  //   Recommended: Ambient for a cold start.
  INITIAL_TEMPERATURE_C: 20,

  // AMBIENT_TEMPERATURE_C
  //   Role: Temperature the kiln cools toward with no heat input; lower clamp.
  //   Critical: -40–60 °C.
  //   Recommended: 20 °C.
  AMBIENT_TEMPERATURE_C: 20,

  // PLANT_TIME_CONSTANT_SEC
  //   Role: First-order lag of the kiln thermal mass.
  //   Critical: > 0 and larger than TICK_DT_SEC.
  //   Recommended: 300–1800 s; 600 s keeps a demo run watchable.
  PLANT_TIME_CONSTANT_SEC: 600,

  // PLANT_PROCESS_GAIN_C_PER_PCT
  //   Role: Steady-state temperature rise per % of output.
  //   Critical: > 0.
  //   Recommended: Gain × 100 + ambient a little above SETPOINT_C, so full output can reach it.
  PLANT_PROCESS_GAIN_C_PER_PCT: 15,

  // MAX_TEMPERATURE_C
  //   Role: Physical upper limit; the model clamps here (SATURATION).
  //   Critical: > AMBIENT_TEMPERATURE_C.
  //   Recommended: 1600 °C, refractory lining limit.
  MAX_TEMPERATURE_C: 1600,

  // TICK_DT_SEC
  //   Role: Simulated seconds advanced per tick.
  //   Critical: > 0 and < PLANT_TIME_CONSTANT_SEC.
  //   Recommended: ≤ 1 % of the time constant; 1 s.
  TICK_DT_SEC: 1,

  // TICK_PERIOD_MS
  //   Role: Wall-clock period between ticks in the live server.
  //   Critical: 10–60000 ms.
  //   Recommended: 100 ms (10 simulated seconds per real second at dt = 1).
  TICK_PERIOD_MS: 100,

  // HISTORY_CAPACITY
  //   Role: Samples kept for trend charts and summaries (oldest evicted).
  //   Critical: Integer 1–1000000.
  //   Recommended: 3600 (one simulated hour at dt = 1).
  HISTORY_CAPACITY: 3600,

  // IDLE_FUEL_RATE_KG_H / FUEL_RATE_PER_PCT_KG_H
  //   Role: Fuel feed = idle + per-% × output, kg/h.
  //   Critical: ≥ 0.
  //   Recommended: 100 kg/h idle, 9 kg/h per %.
  IDLE_FUEL_RATE_KG_H: 100,
  FUEL_RATE_PER_PCT_KG_H: 9,

  // CO2_PER_KG_FUEL
  //   Role: CO2 released per kg of fuel burned.
  //   Critical: ≥ 0.
  //   Recommended: 3.17 (coal-like fuel).
  CO2_PER_KG_FUEL: 3.17,

  // CO2_TEMP_COEFF_KG_H_PER_C / CO2_REFERENCE_TEMP_C
  //   Role: Extra CO2 per °C above the reference temperature.
  //   Critical: Coefficient ≥ 0.
  //   Recommended: 0.05 kg/h per °C above 20 °C.
  CO2_TEMP_COEFF_KG_H_PER_C: 0.05,
  CO2_REFERENCE_TEMP_C: 20,

  // QUALITY_GOOD_C / QUALITY_PARTIAL_C
  //   Role: Clinker quality thresholds (good / partial / poor).
  //   Critical: QUALITY_PARTIAL_C < QUALITY_GOOD_C.
  //   Recommended: 1350 / 1200 °C.
  QUALITY_GOOD_C: 1350,
  QUALITY_PARTIAL_C: 1200,

  // SETPOINT_BAND_C
  //   Role: Half-width of the band counted as "on setpoint" in run summaries.
  //   Critical: > 0.
  //   Recommended: 10–25 °C.
  SETPOINT_BAND_C: 15,

  // BASELINE_FUEL_RATE_KG_H
  //   Role: Fuel rate of an uncontrolled kiln, for the efficiency estimate.
  //   Critical: > 0.
  //   Recommended: 700 kg/h.
  BASELINE_FUEL_RATE_KG_H: 700,

  // OPERATING_DAYS_PER_YEAR
  //   Role: Days per year the kiln runs, for annualised savings.
  //   Critical: 1–366.
  //   Recommended: 330 (allows for maintenance shutdowns).
  OPERATING_DAYS_PER_YEAR: 330,

  // FUEL_PRICE_PER_TONNE
  //   Role: Fuel price used to value the savings.
  //   Critical: ≥ 0.
  //   Recommended: Local price; 15 per tonne by default.
  FUEL_PRICE_PER_TONNE: 15,

  // KILN_MOTOR_RPM
  //   Role: Drum rotation speed, cosmetic and for residence time.
  //   Critical: > 0 and ≤ 10.
  //   Recommended: 1–5 RPM; 2.5 RPM.
  KILN_MOTOR_RPM: 2.5,

  // PERF_LOG_INTERVAL_SEC
  //   Role: Wall-clock interval (s) at which tick timing stats are logged.
  //   Critical: 1–86400 s.
  //   Recommended: 60 s.
  PERF_LOG_INTERVAL_SEC: 60,

  // PERF_SLOW_TICK_THRESHOLD_MS
  //   Role: Tick execution time above which a tick counts as slow.
  //   Critical: 1–10000 ms.
  //   Recommended: Well below TICK_PERIOD_MS; 20 ms.
  PERF_SLOW_TICK_THRESHOLD_MS: 20,

  // PERF_WARN_SLOW_TICKS
  //   Role: Whether to log a warning for every slow tick.
  //   Critical: Boolean only.
  //   Recommended: false to avoid log spam.
  PERF_WARN_SLOW_TICKS: false,

  // CONSOLE_ENABLED
  //   Role: Master switch for Console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to Console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_BUFFER_SIZE
  //   Role: Maximum number of queued console log messages.
  //   Critical: 10–10000.
  //   Recommended: 200.
  CONSOLE_BUFFER_SIZE: 200,

  // CONSOLE_INTERVAL_MS
  //   Role: Interval between draining queued console logs in ms.
  //   Critical: 1–1000 ms.
  //   Recommended: 10 ms.
  CONSOLE_INTERVAL_MS: 10,

  // GLOBAL_LOG_LEVEL
  //   Role: Current master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation, 0 (DEBUG) only during tuning.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours of uptime after which INFO logs are suppressed (0 disables).
  //   Critical: 0–720 h.
  //   Recommended: 24 h for a long-running server.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 24,
};

// ─────────────────────────────────────────────────────────────
// APP CONSTANTS
//   Engine internals that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<KilnAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; *_LOG_LEVEL settings must use these.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3 (standard convention).
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // MAX_PENDING_COMMANDS
  //   Role: Commands that may queue behind a running tick before new ones are refused.
  //   Critical: ≥ 1.
  //   Recommended: 32; listeners rarely issue more than a couple per tick.
  MAX_PENDING_COMMANDS: 32,

  // DEBUG_STATUS_EVERY_TICKS
  //   Role: Emit a DEBUG status line every N ticks (0 disables).
  //   Critical: Integer ≥ 0.
  //   Recommended: 60 (once per simulated minute at dt = 1).
  DEBUG_STATUS_EVERY_TICKS: 60,

  // INITIAL_TICK_TIME_MIN
  //   Role: Initial value for the minimum tick time in performance metrics.
  //   Critical: Must be Infinity so the first tick correctly sets the minimum.
  //   Recommended: Do not change.
  INITIAL_TICK_TIME_MIN: Infinity,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

const CONFIG: KilnConfig = Object.assign({}, APP_CONSTANTS, USER_CONFIG);

export default CONFIG;
