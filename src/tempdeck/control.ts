/**
 * Tempdeck Control
 * Public driver API: identify, setpoint, temperature readback, discovery
 */

import { LineProtocol } from "../protocol/engine";
import { TempdeckCommand, setTargetCommand } from "../protocol/commands";
import {
  parseFloatOrNone,
  parseFloatStrict,
  parseText,
  requireField,
  type FieldParsers,
} from "../protocol/fields";
import { SerialTransport, type LineTransport } from "../serial/transport";
import {
  createDiscovery,
  DEFAULT_USB_IDS,
  matchesUsbId,
  type DeviceDiscovery,
  type UsbId,
} from "../discovery";
import { deviceNotFound } from "../errors";
import { createLogger, type Logger } from "../logger";
import { config } from "../config";

/**
 * Identity reported by M115, fixed for the life of a connection
 */
export interface DeviceIdentity {
  model: string;
  serial: string;
  version: string;
}

export interface TemperatureReading {
  /** Setpoint in °C, null while heating/cooling is deactivated */
  targetTemp: number | null;
  /** Measured temperature in °C */
  currentTemp: number;
}

/**
 * A detected tempdeck: logical port name plus USB location when known
 */
export interface ConnectedDevice {
  path: string;
  location: string | null;
}

export interface TempdeckOptions {
  /**
   * Wait for the double "ok" after M18. Some firmware revisions may not
   * send it; turn off if deactivate() times out on a device that did
   * deactivate.
   * @default true
   */
  ackAfterDeactivate?: boolean;
  logger?: Logger;
}

export interface DiscoveryOptions {
  /** USB ids to look for instead of the standard ones */
  usbIds?: readonly UsbId[];
  discovery?: DeviceDiscovery;
}

export type TransportOpener = (path: string) => Promise<LineTransport>;

export interface OpenOptions extends TempdeckOptions, DiscoveryOptions {
  baudRate?: number;
  /** Override how a port is opened (tests, alternative serial stacks) */
  openTransport?: TransportOpener;
}

interface TempFields {
  C: number;
  T: number | null;
}

const IDENTITY_PARSERS: FieldParsers<DeviceIdentity> = {
  model: parseText,
  serial: parseText,
  version: parseText,
};

const TEMP_PARSERS: FieldParsers<TempFields> = {
  C: parseFloatStrict,
  T: parseFloatOrNone,
};

export class TempdeckControl {
  private readonly ackAfterDeactivate: boolean;

  private constructor(
    private readonly protocol: LineProtocol,
    public readonly identity: Readonly<DeviceIdentity>,
    options: TempdeckOptions
  ) {
    this.ackAfterDeactivate = options.ackAfterDeactivate ?? true;
  }

  /**
   * Take over an open transport and identify the device
   *
   * The returned instance is ready for every operation. If identification
   * fails the transport is left open; the caller owns it.
   * @throws TempdeckError (response_timeout, invalid_response)
   */
  static async open(transport: LineTransport, options: TempdeckOptions = {}): Promise<TempdeckControl> {
    const log = options.logger ?? createLogger("tempdeck", config.LOG_LEVEL);
    const protocol = new LineProtocol(transport, log);
    const identity = await identify(protocol);
    log.info(`Connected to ${identity.model} (serial ${identity.serial}, firmware ${identity.version})`);
    return new TempdeckControl(protocol, Object.freeze(identity), options);
  }

  /**
   * All tempdecks currently connected over USB, matched by vendor/product
   * id. Ports are not opened. Order is whatever the OS enumeration gives
   * and may change between calls.
   */
  static async listConnectedDevices(options: DiscoveryOptions = {}): Promise<ConnectedDevice[]> {
    const usbIds = options.usbIds ?? DEFAULT_USB_IDS;
    const discovery = options.discovery ?? createDiscovery();
    const ports = await discovery.listSerialPorts();
    return ports
      .filter((p) => matchesUsbId(p, usbIds))
      .map((p) => ({ path: p.path, location: p.location ?? null }));
  }

  /**
   * Open the first tempdeck found by listConnectedDevices()
   * @throws TempdeckError (device_not_found) if none is connected
   */
  static async openFirstDevice(options: OpenOptions = {}): Promise<TempdeckControl> {
    const devices = await TempdeckControl.listConnectedDevices(options);
    const first = devices[0];
    if (!first) {
      throw deviceNotFound("No tempdecks found");
    }
    return TempdeckControl.fromSerialPortname(first.path, options);
  }

  /**
   * Open the tempdeck plugged into a given USB port. Tempdecks expose no
   * USB serial number, so the physical location is the stable handle.
   * @throws TempdeckError (device_not_found) if nothing matches
   */
  static async fromUsbLocation(location: string, options: OpenOptions = {}): Promise<TempdeckControl> {
    const devices = await TempdeckControl.listConnectedDevices(options);
    const match = devices.find((d) => d.location === location);
    if (!match) {
      throw deviceNotFound(`No tempdeck detected at USB location '${location}'`);
    }
    return TempdeckControl.fromSerialPortname(match.path, options);
  }

  /**
   * Open a serial port by name and identify the device on it. The port is
   * closed again if identification fails. Port-open errors from the serial
   * library propagate unchanged.
   */
  static async fromSerialPortname(path: string, options: OpenOptions = {}): Promise<TempdeckControl> {
    const log = options.logger ?? createLogger("tempdeck", config.LOG_LEVEL);
    const openTransport: TransportOpener =
      options.openTransport ??
      ((p) => SerialTransport.open(p, { baudRate: options.baudRate ?? config.BAUD_RATE, logger: log }));

    log.debug(`Opening ${path}`);
    const transport = await openTransport(path);
    try {
      return await TempdeckControl.open(transport, { ...options, logger: log });
    } catch (err) {
      await transport.close().catch((closeErr: unknown) => {
        log.warn(`Failed to close ${path} after identify error:`, closeErr);
      });
      throw err;
    }
  }

  /**
   * Set the target temperature and activate heating/cooling. The value is
   * not range-checked here; the firmware decides what it accepts.
   * @param temp Target temperature in °C
   */
  async setTargetTemp(temp: number): Promise<void> {
    await this.protocol.sendCommand(setTargetCommand(temp));
    await this.protocol.waitForAck();
  }

  /**
   * Read setpoint and measured temperature in one exchange
   */
  async getTemps(): Promise<TemperatureReading> {
    const { fields, raw } = await this.protocol.ask<TempFields>(TempdeckCommand.GET_TEMPS, TEMP_PARSERS);
    const currentTemp = requireField(fields.C, "current temp", raw);
    const targetTemp = requireField(fields.T, "target temp", raw);
    return { targetTemp, currentTemp };
  }

  /**
   * Current setpoint, null if deactivated.
   * Note: does a full M105 exchange; use getTemps() if you need both values.
   */
  async getTargetTemp(): Promise<number | null> {
    const { targetTemp } = await this.getTemps();
    return targetTemp;
  }

  /**
   * Measured temperature.
   * Note: does a full M105 exchange; use getTemps() if you need both values.
   */
  async getCurrentTemp(): Promise<number> {
    const { currentTemp } = await this.getTemps();
    return currentTemp;
  }

  /**
   * Clear the setpoint and stop heating/cooling
   */
  async deactivate(): Promise<void> {
    await this.protocol.sendCommand(TempdeckCommand.DEACTIVATE);
    if (this.ackAfterDeactivate) {
      await this.protocol.waitForAck();
    }
  }

  /**
   * Close the underlying transport
   */
  close(): Promise<void> {
    return this.protocol.close();
  }

  get modelName(): string {
    return this.identity.model;
  }

  get serialNo(): string {
    return this.identity.serial;
  }

  get fwVersion(): string {
    return this.identity.version;
  }
}

async function identify(protocol: LineProtocol): Promise<DeviceIdentity> {
  const { fields, raw } = await protocol.ask<DeviceIdentity>(TempdeckCommand.IDENTIFY, IDENTITY_PARSERS);
  return {
    model: requireField(fields.model, "model", raw),
    serial: requireField(fields.serial, "serial", raw),
    version: requireField(fields.version, "version", raw),
  };
}
