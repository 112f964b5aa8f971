import { fromPromise } from 'xstate';
import { linkLogger } from '../../../logger';
import type { SensorTransport } from '../../transport/types';

/**
 * Init actor - waits for the local adapter to power on
 */
export const initializeAdapter = fromPromise<void, { transport: SensorTransport }>(async ({ input }) => {
  linkLogger.debug('Initializing adapter');
  await input.transport.initialize();
});
