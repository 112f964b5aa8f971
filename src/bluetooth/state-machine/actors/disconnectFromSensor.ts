import { fromPromise } from 'xstate';
import { describeError } from '../../../exceptions';
import { linkLogger } from '../../../logger';
import type { SensorTransport } from '../../transport/types';

/**
 * Disconnect actor - tears the link down; failures are logged, not raised
 */
export const disconnectFromSensor = fromPromise<void, { transport: SensorTransport }>(async ({ input }) => {
  try {
    await input.transport.disconnect();
  } catch (error) {
    linkLogger.warn('Disconnect failed', { error: describeError(error, 'unknown') }, 'CONNECTION');
  }
});
