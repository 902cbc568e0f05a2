/**
 * Serial port discovery backed by the serialport package
 *
 * serialport reports no USB location on Linux, so there it is read from
 * sysfs: /sys/class/tty/<name>/device resolves to the USB interface
 * directory (e.g. ".../1-1.2/1-1.2:1.0"), or to a child of it for
 * usb-serial converters (".../1-1.2:1.0/ttyUSB0").
 */

import { SerialPort } from "serialport";
import { realpath } from "fs/promises";
import { basename, dirname, join } from "path";
import type { DeviceDiscovery, DeviceInfo } from "./interface";

/**
 * What discovery reads from a port enumeration entry
 */
export interface ListedPort {
  path: string;
  vendorId?: string;
  productId?: string;
  locationId?: string;
}

export interface SerialPortDiscoveryOptions {
  /** @default "/sys" */
  sysfsRoot?: string;
  /** Port enumeration, SerialPort.list() unless replaced */
  listPorts?: () => Promise<ListedPort[]>;
}

// "<bus>-<port>[.<port>...]:<config>.<interface>"
const USB_INTERFACE = /^\d+-[\d.]+:\d+\.\d+$/;

export class SerialPortDiscovery implements DeviceDiscovery {
  private sysfsRoot: string;
  private listPorts: () => Promise<ListedPort[]>;

  constructor(options: SerialPortDiscoveryOptions = {}) {
    this.sysfsRoot = options.sysfsRoot ?? "/sys";
    this.listPorts = options.listPorts ?? (() => SerialPort.list());
  }

  async listSerialPorts(): Promise<DeviceInfo[]> {
    const ports = await this.listPorts();
    return Promise.all(
      ports.map(async (p) => ({
        path: p.path,
        vendorId: p.vendorId,
        productId: p.productId,
        location: p.locationId ?? (await this.sysfsLocation(p.path)),
      }))
    );
  }

  /**
   * USB interface name of a tty from sysfs, undefined if it has none
   */
  async sysfsLocation(path: string): Promise<string | undefined> {
    let devicePath: string;
    try {
      devicePath = await realpath(join(this.sysfsRoot, "class", "tty", basename(path), "device"));
    } catch {
      // Not a tty known to sysfs (other platform, or no USB device behind it)
      return undefined;
    }

    for (const candidate of [devicePath, dirname(devicePath)]) {
      const name = basename(candidate);
      if (USB_INTERFACE.test(name)) return name;
    }
    return undefined;
  }
}
