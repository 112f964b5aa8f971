import { fromCallback } from 'xstate';
import { isSameUuid } from '../../attributes';
import { linkLogger } from '../../../logger';
import { readSensorFrame } from '../../../signal/classifier';
import type { SensorTransport } from '../../transport/types';
import type { LinkEvent } from '../types/linkEvent';

export interface LinkListenerInput {
  transport: SensorTransport;
  sensorCharacteristic: string;
}

/**
 * Callback actor for a session - translates transport events into machine
 * events. Only frames from the sensor characteristic are forwarded.
 */
export const linkListener = fromCallback<LinkEvent, LinkListenerInput>(({ sendBack, input }) => {
  return input.transport.subscribe((event) => {
    switch (event.type) {
      case 'linkEstablished':
        sendBack({ type: 'LINK_ESTABLISHED' });
        break;
      case 'linkLost':
        sendBack({ type: 'LINK_LOST', reason: event.reason });
        break;
      case 'servicesDiscovered':
        sendBack({ type: 'SERVICES_DISCOVERED', status: event.status, services: event.services });
        break;
      case 'characteristicNotification': {
        if (!isSameUuid(event.uuid, input.sensorCharacteristic)) return;
        const frame = readSensorFrame(event.value);
        if (!frame) {
          linkLogger.debug('Dropped short sensor payload', { length: event.value.length }, 'SENSOR');
          return;
        }
        sendBack({ type: 'SENSOR_FRAME', frame });
        break;
      }
    }
  });
});
