import * as os from 'node:os';

/**
 * Short description of this device for the sync settings view.
 */
export function getDeviceInfo(): string {
  return `Device: ${os.hostname()}\nSystem: ${os.type()} ${os.release()}`;
}
