/**
 * Mock Device Discovery for Testing
 * Can replace real discovery anywhere a DeviceDiscovery is accepted
 */

import type { DeviceDiscovery, DeviceInfo } from "./interface";

export class MockDiscovery implements DeviceDiscovery {
  private ports: DeviceInfo[];
  public listCalls = 0;

  constructor(ports: DeviceInfo[] = []) {
    this.ports = ports;
  }

  async listSerialPorts(): Promise<DeviceInfo[]> {
    this.listCalls++;
    return [...this.ports];
  }

  // Helper to update mock state during test
  setPorts(ports: DeviceInfo[]): void {
    this.ports = ports;
  }
}
