export interface RotationState {
  /** Drum angle in degrees, 0 to below 360 */
  angleDeg: number;
  /** Material residence time in minutes */
  residenceTimeMin: number;
}
