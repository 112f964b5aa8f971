import { EventEmitter } from 'events';
import { SIGNAL_CODES, type DirectionState, type SignalCode, toSignalCode } from './classifier';

export type SignalListener = (code: SignalCode, direction: DirectionState) => void;

/**
 * Last-value cell for the published direction signal.
 *
 * Readers see only the most recent value. Listeners fire when the code changes.
 */
export class SignalPublisher {
  private readonly emitter = new EventEmitter();
  private code: SignalCode = SIGNAL_CODES.NEUTRAL;
  private lastDirection: DirectionState | null = null;

  get value(): SignalCode {
    return this.code;
  }

  get direction(): DirectionState | null {
    return this.lastDirection;
  }

  publish(direction: DirectionState): void {
    const code = toSignalCode(direction);
    const changed = code !== this.code;
    this.code = code;
    this.lastDirection = direction;
    if (changed) {
      this.emitter.emit('change', code, direction);
    }
  }

  subscribe(listener: SignalListener): () => void {
    this.emitter.on('change', listener);
    return () => {
      this.emitter.off('change', listener);
    };
  }
}
