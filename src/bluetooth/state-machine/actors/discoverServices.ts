import { fromPromise } from 'xstate';
import type { SensorTransport } from '../../transport/types';

/**
 * Discovery actor - requests service discovery; the result arrives as SERVICES_DISCOVERED
 */
export const discoverServices = fromPromise<void, { transport: SensorTransport }>(async ({ input }) => {
  await input.transport.discoverServices();
});
