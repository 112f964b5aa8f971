/**
 * Drives one sensor link session for the command line: logs state and signal
 * changes and decides when the process is done.
 */

import type { SensorLink } from './bluetooth/state-machine';
import { type LinkLogger, linkLogger } from './logger';

export interface SessionRunOptions {
  /** Connect to this address instead of scanning. */
  address?: string;
  /** Called once with the exit code after the session has been stopped. */
  exit: (code: number) => void;
  logger?: LinkLogger;
  shutdownGraceMs?: number;
}

export interface SessionRun {
  shutdown: () => void;
}

export function runSession(link: SensorLink, options: SessionRunOptions): SessionRun {
  const logger = options.logger ?? linkLogger;
  const shutdownGraceMs = options.shutdownGraceMs ?? 2_000;

  let finished = false;
  let shuttingDown = false;
  let previousState = '';
  let previousError: string | null = null;

  const finish = (code: number): void => {
    if (finished) return;
    finished = true;
    link.stop();
    options.exit(code);
  };

  link.subscribe((snapshot) => {
    const currentState = link.getCurrentState();
    if (currentState !== previousState) {
      logger.info(`State: ${previousState || 'initial'} → ${currentState}`, undefined, 'STATE');
      previousState = currentState;
    }
    const error = snapshot.context.error;
    if (error && error !== previousError) {
      logger.error(error, undefined, 'STATE');
    }
    previousError = error;

    if (!snapshot.matches('idle')) return;
    if (shuttingDown) {
      finish(0);
    } else if (error) {
      // Adapter and connect failures end the session for good
      finish(1);
    }
  });

  link.publisher.subscribe((code, direction) => {
    logger.info(`Signal ${code} (${direction})`, undefined, 'SIGNAL');
  });

  if (options.address) {
    link.connect(options.address);
  } else {
    link.start();
  }

  return {
    shutdown: () => {
      if (shuttingDown || finished) return;
      shuttingDown = true;
      logger.info('Shutting down', undefined, 'STATE');
      link.disconnect();
      if (link.actor.getSnapshot().matches('idle')) finish(0);
      setTimeout(() => finish(0), shutdownGraceMs).unref();
    },
  };
}
