/**
 * Cosmetic drum rotation for live displays
 *
 * Not part of the thermal model: the angle is derived from simulated time
 * and motor speed only, so it stays deterministic.
 */

import type { RotationState } from './types';

/** Residence time in minutes at 1 RPM */
const RESIDENCE_MINUTES_AT_1_RPM = 30;

/**
 * Drum angle after elapsedSec at a constant motor speed
 * @returns Degrees in [0, 360)
 */
export function rotationAngle(elapsedSec: number, rpm: number): number {
  const turns = (elapsedSec * rpm) / 60;
  const angle = (turns - Math.floor(turns)) * 360;
  return angle >= 360 ? 0 : angle;
}

/**
 * Minutes material spends in the drum; slower rotation keeps it longer
 */
export function residenceTimeMinutes(rpm: number): number {
  return RESIDENCE_MINUTES_AT_1_RPM / rpm;
}

export function rotationState(elapsedSec: number, rpm: number): RotationState {
  return {
    angleDeg: rotationAngle(elapsedSec, rpm),
    residenceTimeMin: residenceTimeMinutes(rpm)
  };
}
