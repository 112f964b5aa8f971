export { initializeAdapter } from './initializeAdapter';
export { scanForSensor, matchesNameFilter, type ScanInput } from './scanForSensor';
export { linkListener, type LinkListenerInput } from './linkListener';
export { connectToSensor } from './connectToSensor';
export { discoverServices } from './discoverServices';
export { subscriptionRetry, type SubscriptionInput } from './subscriptionRetry';
export { disconnectFromSensor } from './disconnectFromSensor';
