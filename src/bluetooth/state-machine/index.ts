export { linkMachine, type LinkContext, type LinkEvent, type LinkInput } from './link-machine';

export {
  selectAddress,
  selectCatalog,
  selectCurrentState,
  selectDeviceName,
  selectDirection,
  selectError,
  selectFramesReceived,
  selectIsConnected,
  selectIsConnecting,
  selectIsIdle,
  selectIsScanning,
  selectIsStreaming,
  selectLinkState,
  selectReconnects,
  type LinkSnapshot,
  type LinkState,
} from './selectors';

export { createSensorLink, type SensorLink, type SensorLinkOptions } from './sensorLink';
