import type { SnapshotFrom, StateValue } from 'xstate';
import type { linkMachine } from './link-machine';

export type LinkSnapshot = SnapshotFrom<typeof linkMachine>;
export type LinkState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED';

// Selectors for consumers of the link actor
export const selectAddress = (state: LinkSnapshot) => state.context.address;
export const selectDeviceName = (state: LinkSnapshot) => state.context.deviceName;
export const selectCatalog = (state: LinkSnapshot) => state.context.catalog;
export const selectDirection = (state: LinkSnapshot) => state.context.direction;
export const selectError = (state: LinkSnapshot) => state.context.error;
export const selectFramesReceived = (state: LinkSnapshot) => state.context.framesReceived;
export const selectReconnects = (state: LinkSnapshot) => state.context.reconnects;

export const selectIsIdle = (state: LinkSnapshot) => state.matches('idle');

export const selectIsScanning = (state: LinkSnapshot) => state.matches({ session: 'scanning' });

export const selectIsConnecting = (state: LinkSnapshot) =>
  state.matches({ session: 'connecting' }) || state.matches({ session: 'abortingConnect' });

export const selectIsConnected = (state: LinkSnapshot) => state.matches({ session: 'connected' });

export const selectIsStreaming = (state: LinkSnapshot) =>
  state.matches({ session: { connected: 'streaming' } });

export const selectLinkState = (state: LinkSnapshot): LinkState => {
  if (selectIsConnected(state)) return 'CONNECTED';
  if (selectIsConnecting(state)) return 'CONNECTING';
  return 'DISCONNECTED';
};

function toStatePath(value: StateValue): string {
  if (typeof value === 'string') return value;
  for (const [key, child] of Object.entries(value)) {
    return child === undefined ? key : `${key}.${toStatePath(child)}`;
  }
  return 'unknown';
}

export const selectCurrentState = (state: LinkSnapshot) => toStatePath(state.value);
