/**
 * Direction classification of two-channel sensor frames.
 *
 * The first channel drives RIGHT, the second LEFT. When both channels are
 * active the previous direction is held; from STOP nothing fires and STOP is
 * kept.
 */

export type DirectionState = 'STOP' | 'LEFT' | 'RIGHT';

export interface SensorFrame {
  first: number;
  second: number;
}

export const DEFAULT_THRESHOLD = 100;

export const SIGNAL_CODES = {
  NEUTRAL: 0,
  LEFT: 1,
  RIGHT: 2,
  STOP: 3,
} as const;

export type SignalCode = (typeof SIGNAL_CODES)[keyof typeof SIGNAL_CODES];

export function toSignalCode(direction: DirectionState): SignalCode {
  return SIGNAL_CODES[direction];
}

/**
 * First two bytes of a notification payload, or null when it is too short.
 */
export function readSensorFrame(value: Uint8Array): SensorFrame | null {
  if (value.length < 2) {
    return null;
  }
  return { first: value[0], second: value[1] };
}

export function classifyFrame(
  frame: SensorFrame,
  previous: DirectionState,
  threshold: number = DEFAULT_THRESHOLD
): DirectionState {
  const right = frame.first > threshold;
  const left = frame.second > threshold;

  if ((right && left && previous === 'LEFT') || (!right && left)) {
    return 'LEFT';
  }
  if ((right && left && previous === 'RIGHT') || (right && !left)) {
    return 'RIGHT';
  }
  if (!right && !left) {
    return 'STOP';
  }
  return previous;
}
