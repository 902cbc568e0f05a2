/**
 * Device Discovery Interface
 * The serial enumeration the driver needs: logical port name, USB ids and
 * (when the platform reports one) the physical USB location
 */

export interface DeviceInfo {
  path: string;
  vendorId?: string;
  productId?: string;
  location?: string;
}

export interface DeviceDiscovery {
  /**
   * List all available serial ports, in the order the OS reports them
   */
  listSerialPorts(): Promise<DeviceInfo[]>;
}

/**
 * USB vendor/product pair
 */
export interface UsbId {
  vendorId: number;
  productId: number;
}

// Tempdeck (Microchip VID)
export const DEFAULT_USB_IDS: readonly UsbId[] = [
  { vendorId: 0x04d8, productId: 0xee93 },
];

const HEX_ID = /^(?:0x)?[0-9a-f]{1,4}$/i;

function parseHexId(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!HEX_ID.test(trimmed)) return null;
  return parseInt(trimmed.replace(/^0x/i, ""), 16);
}

/**
 * Parse "04d8:ee93,1234:abcd" into USB ids; malformed entries are skipped
 */
export function parseUsbIds(value: string): UsbId[] {
  const ids: UsbId[] = [];
  for (const entry of value.split(",")) {
    const [vid, pid, ...rest] = entry.split(":");
    const vendorId = parseHexId(vid);
    const productId = parseHexId(pid);
    if (vendorId !== null && productId !== null && rest.length === 0) {
      ids.push({ vendorId, productId });
    }
  }
  return ids;
}

export function formatUsbId(id: UsbId): string {
  const hex = (n: number) => n.toString(16).padStart(4, "0");
  return `${hex(id.vendorId)}:${hex(id.productId)}`;
}

/**
 * Serial enumeration reports ids as hex strings ("04d8", "04D8" on Windows)
 */
export function matchesUsbId(device: DeviceInfo, ids: readonly UsbId[]): boolean {
  const vendorId = parseHexId(device.vendorId);
  const productId = parseHexId(device.productId);
  if (vendorId === null || productId === null) return false;
  return ids.some((id) => id.vendorId === vendorId && id.productId === productId);
}
