import { createActor } from 'xstate';
import { type SensorLinkConfig, type SensorLinkConfigInput, parseConfig } from '../../config';
import { SignalPublisher } from '../../signal/publisher';
import type { SensorTransport } from '../transport/types';
import { linkMachine } from './link-machine';
import {
  type LinkSnapshot,
  selectAddress,
  selectCatalog,
  selectCurrentState,
  selectDirection,
  selectError,
  selectLinkState,
} from './selectors';

export interface SensorLinkOptions {
  transport: SensorTransport;
  publisher?: SignalPublisher;
  config?: SensorLinkConfigInput;
}

/**
 * Creates and starts a link actor bound to one transport and one publisher.
 */
export function createSensorLink(options: SensorLinkOptions) {
  const config: SensorLinkConfig = parseConfig(options.config ?? {});
  const publisher = options.publisher ?? new SignalPublisher();
  const actor = createActor(linkMachine, {
    input: { transport: options.transport, publisher, config },
  });
  actor.start();

  const send = actor.send;

  return {
    actor,
    publisher,
    config,

    // Actions
    start: () => send({ type: 'START' }),
    connect: (address: string) => send({ type: 'CONNECT', address }),
    disconnect: () => send({ type: 'DISCONNECT' }),
    stop: () => {
      actor.stop();
    },

    // Selectors
    getLinkState: () => selectLinkState(actor.getSnapshot()),
    getAddress: () => selectAddress(actor.getSnapshot()),
    getCatalog: () => selectCatalog(actor.getSnapshot()),
    getDirection: () => selectDirection(actor.getSnapshot()),
    getError: () => selectError(actor.getSnapshot()),
    getCurrentState: () => selectCurrentState(actor.getSnapshot()),
    subscribe: (listener: (snapshot: LinkSnapshot) => void) => actor.subscribe(listener),
  };
}

export type SensorLink = ReturnType<typeof createSensorLink>;
