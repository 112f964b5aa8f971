#!/usr/bin/env node
/**
 * sensor-link CLI
 * Scans for the sensor band (or connects to the address given as the first
 * argument) and logs link state and published signal changes.
 */

import { createSensorLink } from './bluetooth/state-machine';
import { NobleTransport } from './bluetooth/transport/nobleTransport';
import { runSession } from './cli';
import { loadConfig } from './config';
import { describeError } from './exceptions';
import { linkLogger } from './logger';

function main(): void {
  const config = loadConfig();
  linkLogger.setLevel(config.logLevel);

  const link = createSensorLink({ transport: new NobleTransport(), config });
  const session = runSession(link, {
    address: process.argv[2],
    exit: (code) => process.exit(code),
  });

  process.once('SIGINT', session.shutdown);
  process.once('SIGTERM', session.shutdown);
}

try {
  main();
} catch (error) {
  linkLogger.error(describeError(error, 'sensor-link failed to start'));
  process.exitCode = 1;
}
