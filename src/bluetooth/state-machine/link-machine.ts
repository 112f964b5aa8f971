import { assign, setup } from 'xstate';
import { buildServiceCatalog } from '../attributes';
import type { DiscoveredService } from '../transport/types';
import { describeError } from '../../exceptions';
import { linkLogger } from '../../logger';
import { classifyFrame, type SensorFrame } from '../../signal/classifier';
import {
  connectToSensor,
  disconnectFromSensor,
  discoverServices,
  initializeAdapter,
  linkListener,
  scanForSensor,
  subscriptionRetry,
} from './actors';
import type { LinkContext, LinkInput } from './types/linkContext';
import type { LinkEvent } from './types/linkEvent';

export type { LinkContext, LinkInput } from './types/linkContext';
export type { LinkEvent } from './types/linkEvent';

// State Machine
export const linkMachine = setup({
  types: {
    context: {} as LinkContext,
    events: {} as LinkEvent,
    input: {} as LinkInput,
  },
  actors: {
    initializeAdapter,
    scanForSensor,
    linkListener,
    connectToSensor,
    discoverServices,
    subscriptionRetry,
    disconnectFromSensor,
  },
  actions: {
    clearError: assign({ error: null }),
    setError: assign({
      error: (_, params: { message: string }) => params.message,
    }),
    setAddress: assign({
      address: (_, params: { address: string; name: string | null }) => params.address,
      deviceName: (_, params: { address: string; name: string | null }) => params.name,
    }),
    clearAddress: assign({
      address: null,
      deviceName: null,
    }),
    setCatalog: assign({
      catalog: (_, params: { services: DiscoveredService[] }) => buildServiceCatalog(params.services),
    }),
    clearCatalog: assign({
      catalog: [],
    }),
    countReconnect: assign({
      reconnects: ({ context }) => context.reconnects + 1,
    }),
    applyFrame: assign(({ context }, params: { frame: SensorFrame }) => ({
      direction: classifyFrame(params.frame, context.direction, context.config.threshold),
      framesReceived: context.framesReceived + 1,
    })),
    publishDirection: ({ context }) => {
      context.publisher.publish(context.direction);
    },
    logError: (_, params: { message: string }) => {
      linkLogger.error(params.message);
    },
    logLinkLost: ({ context }, params: { reason?: string }) => {
      linkLogger.warn(`Link lost, reconnecting to ${context.address}`, { reason: params.reason }, 'CONNECTION');
    },
    logDiscoveryFailure: () => {
      linkLogger.debug('Service discovery did not succeed', undefined, 'DISCOVERY');
    },
    logTeardownTimeout: ({ context }) => {
      linkLogger.warn(`Disconnect from ${context.address} did not complete`, undefined, 'CONNECTION');
    },
  },
  guards: {
    hasAddress: ({ context }) => context.address !== null,
  },
  delays: {
    connectTimeout: ({ context }) => context.config.connectTimeoutMs,
    disconnectTimeout: ({ context }) => context.config.disconnectTimeoutMs,
  },
}).createMachine({
  id: 'sensorLink',
  initial: 'idle',
  context: ({ input }) => ({
    transport: input.transport,
    publisher: input.publisher,
    config: input.config,
    address: null,
    deviceName: null,
    catalog: [],
    direction: 'STOP',
    framesReceived: 0,
    reconnects: 0,
    error: null,
  }),
  states: {
    idle: {
      on: {
        START: {
          target: 'session',
          actions: ['clearError', 'clearAddress'],
        },
        CONNECT: [
          {
            guard: ({ event }) => event.address.trim().length === 0,
            actions: [
              {
                type: 'setError',
                params: { message: 'Cannot connect without a peripheral address' },
              },
            ],
          },
          {
            target: 'session',
            actions: [
              'clearError',
              {
                type: 'setAddress',
                params: ({ event }) => ({ address: event.address.trim(), name: null }),
              },
            ],
          },
        ],
      },
    },

    session: {
      initial: 'initializing',
      invoke: {
        src: 'linkListener',
        input: ({ context }) => ({
          transport: context.transport,
          sensorCharacteristic: context.config.sensorCharacteristic,
        }),
      },
      on: {
        DISCONNECT: {
          target: '.disconnecting',
        },
      },
      states: {
        initializing: {
          invoke: {
            src: 'initializeAdapter',
            input: ({ context }) => ({ transport: context.transport }),
            onDone: [
              {
                guard: 'hasAddress',
                target: 'connecting',
              },
              {
                target: 'scanning',
              },
            ],
            onError: {
              target: '#sensorLink.idle',
              actions: [
                {
                  type: 'setError',
                  params: ({ event }) => ({
                    message: describeError(event.error, 'Bluetooth adapter unavailable'),
                  }),
                },
                {
                  type: 'logError',
                  params: ({ event }) => ({
                    message: describeError(event.error, 'Bluetooth adapter unavailable'),
                  }),
                },
              ],
            },
          },
        },

        scanning: {
          invoke: {
            src: 'scanForSensor',
            input: ({ context }) => ({
              transport: context.transport,
              nameFilter: context.config.nameFilter,
            }),
          },
          on: {
            SENSOR_FOUND: {
              target: 'connecting',
              actions: [
                {
                  type: 'setAddress',
                  params: ({ event }) => ({ address: event.address, name: event.name }),
                },
              ],
            },
            SCAN_FAILED: {
              target: '#sensorLink.idle',
              actions: [
                {
                  type: 'setError',
                  params: ({ event }) => ({ message: event.message }),
                },
              ],
            },
            DISCONNECT: {
              target: '#sensorLink.idle',
            },
          },
        },

        connecting: {
          invoke: {
            src: 'connectToSensor',
            input: ({ context }) => ({
              transport: context.transport,
              address: context.address,
            }),
            onError: {
              target: '#sensorLink.idle',
              actions: [
                {
                  type: 'setError',
                  params: ({ event }) => ({
                    message: describeError(event.error, 'Connection failed'),
                  }),
                },
                {
                  type: 'logError',
                  params: ({ event }) => ({
                    message: describeError(event.error, 'Connection failed'),
                  }),
                },
              ],
            },
          },
          after: {
            connectTimeout: {
              target: 'abortingConnect',
              actions: [
                {
                  type: 'setError',
                  params: ({ context }) => ({
                    message: `Connection to ${context.address} timed out`,
                  }),
                },
              ],
            },
          },
          on: {
            LINK_ESTABLISHED: {
              target: 'connected',
              actions: ['clearError'],
            },
            LINK_LOST: {
              target: 'connecting',
              reenter: true,
              actions: [
                'countReconnect',
                {
                  type: 'logLinkLost',
                  params: ({ event }) => ({ reason: event.reason }),
                },
              ],
            },
          },
        },

        abortingConnect: {
          invoke: {
            src: 'disconnectFromSensor',
            input: ({ context }) => ({ transport: context.transport }),
            onDone: {
              target: 'connecting',
              actions: ['countReconnect'],
            },
          },
          after: {
            disconnectTimeout: {
              target: 'connecting',
              actions: ['logTeardownTimeout', 'countReconnect'],
            },
          },
        },

        connected: {
          initial: 'discovering',
          on: {
            LINK_ESTABLISHED: {
              target: '.discovering',
              reenter: true,
              actions: ['clearCatalog'],
            },
            LINK_LOST: {
              target: 'connecting',
              actions: [
                'clearCatalog',
                'countReconnect',
                {
                  type: 'logLinkLost',
                  params: ({ event }) => ({ reason: event.reason }),
                },
              ],
            },
          },
          states: {
            discovering: {
              invoke: {
                src: 'discoverServices',
                input: ({ context }) => ({ transport: context.transport }),
                onError: {
                  actions: ['logDiscoveryFailure'],
                },
              },
              on: {
                SERVICES_DISCOVERED: [
                  {
                    guard: ({ event }) => event.status === 'success',
                    target: 'subscribing',
                    actions: [
                      {
                        type: 'setCatalog',
                        params: ({ event }) => ({ services: event.services }),
                      },
                    ],
                  },
                  {
                    actions: ['logDiscoveryFailure'],
                  },
                ],
              },
            },
            subscribing: {
              invoke: {
                src: 'subscriptionRetry',
                input: ({ context }) => ({
                  transport: context.transport,
                  catalog: context.catalog,
                  characteristic: context.config.sensorCharacteristic,
                  intervalMs: context.config.subscribeIntervalMs,
                }),
              },
              on: {
                SENSOR_FRAME: {
                  target: 'streaming',
                  actions: [
                    {
                      type: 'applyFrame',
                      params: ({ event }) => ({ frame: event.frame }),
                    },
                    'publishDirection',
                  ],
                },
              },
            },
            streaming: {
              on: {
                SENSOR_FRAME: {
                  actions: [
                    {
                      type: 'applyFrame',
                      params: ({ event }) => ({ frame: event.frame }),
                    },
                    'publishDirection',
                  ],
                },
              },
            },
          },
        },

        disconnecting: {
          invoke: {
            src: 'disconnectFromSensor',
            input: ({ context }) => ({ transport: context.transport }),
            onDone: {
              target: '#sensorLink.idle',
              actions: ['clearCatalog'],
            },
          },
          after: {
            disconnectTimeout: {
              target: '#sensorLink.idle',
              actions: ['logTeardownTimeout', 'clearCatalog'],
            },
          },
          on: {
            DISCONNECT: {
              actions: [],
            },
          },
        },
      },
    },
  },
});
