import { fromCallback } from 'xstate';
import { findCharacteristic } from '../../attributes';
import { describeError } from '../../../exceptions';
import { linkLogger } from '../../../logger';
import type { SensorTransport, ServiceCatalog } from '../../transport/types';
import type { LinkEvent } from '../types/linkEvent';

export interface SubscriptionInput {
  transport: SensorTransport;
  catalog: ServiceCatalog;
  characteristic: string;
  intervalMs: number;
}

/**
 * Callback actor for the subscribing state - re-issues the notification
 * subscription every interval until the actor is stopped.
 */
export const subscriptionRetry = fromCallback<LinkEvent, SubscriptionInput>(({ input }) => {
  const { transport, catalog, characteristic, intervalMs } = input;
  const target = findCharacteristic(catalog, characteristic);
  let stopped = false;

  const issue = (): void => {
    if (stopped) return;
    if (!target) {
      linkLogger.debug(`Characteristic ${characteristic} not in catalog`, undefined, 'SUBSCRIBE');
      return;
    }
    linkLogger.debug(`Enabling notifications on ${target.name}`, undefined, 'SUBSCRIBE');
    transport.enableNotifications(target.uuid).catch((error: unknown) => {
      linkLogger.warn('Enable notifications failed', { error: describeError(error, 'unknown') }, 'SUBSCRIBE');
    });
  };

  issue();
  const timer = setInterval(issue, intervalMs);

  return () => {
    stopped = true;
    clearInterval(timer);
  };
});
