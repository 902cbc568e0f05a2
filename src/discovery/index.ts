/**
 * Device Discovery Module
 * Re-exports all discovery components
 */

export * from "./interface";
export * from "./serialport";
export * from "./mock";

import type { DeviceDiscovery } from "./interface";
import { SerialPortDiscovery } from "./serialport";

/**
 * Create default discovery instance for current platform
 */
export function createDiscovery(): DeviceDiscovery {
  return new SerialPortDiscovery();
}
