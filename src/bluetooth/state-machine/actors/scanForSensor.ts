import { fromCallback } from 'xstate';
import { describeError } from '../../../exceptions';
import { linkLogger } from '../../../logger';
import type { SensorTransport } from '../../transport/types';
import type { LinkEvent } from '../types/linkEvent';

export interface ScanInput {
  transport: SensorTransport;
  nameFilter: string;
}

export function matchesNameFilter(name: string | null, nameFilter: string): boolean {
  return name !== null && name.includes(nameFilter);
}

/**
 * Callback actor for scanning - reports the first peripheral whose advertised
 * name contains the filter. Scanning stops when the actor is stopped.
 */
export const scanForSensor = fromCallback<LinkEvent, ScanInput>(({ sendBack, input }) => {
  let found = false;

  input.transport
    .startScan((peripheral) => {
      if (found || !matchesNameFilter(peripheral.name, input.nameFilter)) return;
      found = true;
      linkLogger.info(`Found ${peripheral.name} (${peripheral.address})`, { rssi: peripheral.rssi }, 'SCAN');
      sendBack({ type: 'SENSOR_FOUND', address: peripheral.address, name: peripheral.name });
    })
    .catch((error: unknown) => {
      sendBack({ type: 'SCAN_FAILED', message: describeError(error, 'Scan failed') });
    });

  return () => {
    input.transport.stopScan().catch((error: unknown) => {
      linkLogger.warn('Stop scan failed', { error: describeError(error, 'unknown') }, 'SCAN');
    });
  };
});
