import { fromPromise } from 'xstate';
import { ConnectFailureError } from '../../../exceptions';
import { linkLogger } from '../../../logger';
import type { SensorTransport } from '../../transport/types';

/**
 * Connect actor - requests the link; LINK_ESTABLISHED arrives separately
 */
export const connectToSensor = fromPromise<void, { transport: SensorTransport; address: string | null }>(
  async ({ input }) => {
    if (!input.address) {
      throw new ConnectFailureError('No peripheral address to connect to');
    }
    linkLogger.logConnection(input.address, 'connect');
    await input.transport.connect(input.address);
  }
);
