export { rotationAngle, residenceTimeMinutes, rotationState } from './kiln-rotation';
export type { RotationState } from './types';
