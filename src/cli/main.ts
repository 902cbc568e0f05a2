/**
 * tempdeck-ctrl
 * Command-line front end: list devices, set/clear the setpoint, read back
 * temperatures. Everything device-facing goes through TempdeckControl.
 */

import { parseArgs } from "util";
import { createInterface } from "readline/promises";
import { TempdeckControl, type ConnectedDevice } from "../tempdeck/control";
import { parseFloatStrict } from "../protocol/fields";
import { isTempdeckError } from "../errors";
import { createLogger } from "../logger";
import { config as defaultConfig, type TempdeckConfig } from "../config";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDeps {
  stdout(line: string): void;
  stderr(line: string): void;
  prompt(question: string): Promise<string>;
  listDevices(): Promise<ConnectedDevice[]>;
  openByPort(path: string): Promise<TempdeckControl>;
  openByUsb(location: string): Promise<TempdeckControl>;
  openFirst(): Promise<TempdeckControl>;
}

export const USAGE = `Usage: tempdeck-ctrl [-p PORTNAME | -u LOCATION] [-l | -t TEMP | -i | -d]

Options:
  -p, --port PORTNAME     Use serial port identified by PORTNAME
  -u, --usb LOCATION      Select device according to USB port location string
  -l, --list-devices      List detected tempdecks
  -t, --set-target TEMP   Activate temperature control and set target to TEMP (in °C, may be negative)
  -i, --prompt-target     Prompt for target temperature and then set it
  -d, --deactivate        Deactivate temperature control
  -h, --help              Show this help

If no action specified, read back current temperature values.

Environment Variables (overridden by flags):
  TEMPDECK_SERIAL_PORT     Serial port to use
  TEMPDECK_USB_LOCATION    USB location to use
  TEMPDECK_USB_IDS         vid:pid pairs to detect (default: 04d8:ee93)
  TEMPDECK_BAUD_RATE       Serial baud rate (default: 115200)
  TEMPDECK_DEACTIVATE_ACK  Wait for acknowledgment after deactivate (default: true)
  TEMPDECK_LOG_LEVEL       debug, info, warn, error, silent (default: warn)`;

type Action =
  | { type: "list" }
  | { type: "set"; temp: number }
  | { type: "prompt" }
  | { type: "deactivate" }
  | { type: "read" };

type DeviceSelection =
  | { type: "port"; path: string }
  | { type: "usb"; location: string }
  | { type: "first" };

interface ParsedCli {
  action: Action;
  selection: DeviceSelection;
}

class UsageError extends Error {
  public readonly name = "UsageError";
}

const NEGATIVE_NUMBER = /^-(?:\d|\.\d|inf)/i;

/**
 * parseArgs treats "-5" after -t as an option; bind it to -t instead
 */
function joinNegativeTargets(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === "-t" || arg === "--set-target") && next !== undefined && NEGATIVE_NUMBER.test(next)) {
      out.push(`--set-target=${next}`);
      i++;
    } else {
      out.push(arg);
    }
  }
  return out;
}

function parseCli(argv: string[], cfg: TempdeckConfig): ParsedCli | "help" {
  const { values } = parseArgs({
    args: joinNegativeTargets(argv),
    options: {
      port: { type: "string", short: "p" },
      usb: { type: "string", short: "u" },
      "list-devices": { type: "boolean", short: "l", default: false },
      "set-target": { type: "string", short: "t" },
      "prompt-target": { type: "boolean", short: "i", default: false },
      deactivate: { type: "boolean", short: "d", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) return "help";

  if (values.port !== undefined && values.usb !== undefined) {
    throw new UsageError("--port and --usb cannot be used together");
  }

  const actions: Action[] = [];
  if (values["list-devices"]) actions.push({ type: "list" });
  if (values["set-target"] !== undefined) {
    const raw = values["set-target"];
    let temp: number;
    try {
      temp = parseFloatStrict(raw);
    } catch (err) {
      throw new UsageError(`invalid temperature: '${raw}'`, { cause: err });
    }
    actions.push({ type: "set", temp });
  }
  if (values["prompt-target"]) actions.push({ type: "prompt" });
  if (values.deactivate) actions.push({ type: "deactivate" });

  if (actions.length > 1) {
    throw new UsageError("only one of --list-devices, --set-target, --prompt-target, --deactivate may be given");
  }

  let selection: DeviceSelection = { type: "first" };
  if (values.port !== undefined) {
    selection = { type: "port", path: values.port };
  } else if (values.usb !== undefined) {
    selection = { type: "usb", location: values.usb };
  } else if (cfg.SERIAL_PORT) {
    selection = { type: "port", path: cfg.SERIAL_PORT };
  } else if (cfg.USB_LOCATION) {
    selection = { type: "usb", location: cfg.USB_LOCATION };
  }

  return { action: actions[0] ?? { type: "read" }, selection };
}

function formatTemp(temp: number | null): string {
  return temp === null ? "(deactivated)" : `${temp.toFixed(2)} °C`;
}

function describeSelection(selection: DeviceSelection): string {
  switch (selection.type) {
    case "port":
      return `'${selection.path}'`;
    case "usb":
      return `at USB location '${selection.location}'`;
    case "first":
      return "(auto-detected)";
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function openDevice(selection: DeviceSelection, deps: CliDeps): Promise<TempdeckControl> {
  switch (selection.type) {
    case "port":
      return deps.openByPort(selection.path);
    case "usb":
      return deps.openByUsb(selection.location);
    case "first":
      return deps.openFirst();
  }
}

async function runAction(action: Action, td: TempdeckControl, deps: CliDeps): Promise<number> {
  let target: number | null = null;
  let deactivate = action.type === "deactivate";

  if (action.type === "set") {
    target = action.temp;
  } else if (action.type === "prompt") {
    const answer = (await deps.prompt('Enter target temperature ("off" to deactivate): ')).trim();
    if (answer.toLowerCase() === "off") {
      deactivate = true;
    } else {
      try {
        target = parseFloatStrict(answer);
      } catch {
        deps.stderr(`Invalid temperature: '${answer}'`);
        return EXIT_FAILURE;
      }
    }
  }

  if (target !== null) {
    await td.setTargetTemp(target);
    const newTarget = await td.getTargetTemp();
    deps.stdout(`Target set to ${formatTemp(newTarget)}`);
  } else if (deactivate) {
    await td.deactivate();
    deps.stdout("Temperature control deactivated");
  } else {
    const { targetTemp, currentTemp } = await td.getTemps();
    deps.stdout(`Target:  ${formatTemp(targetTemp)}`);
    deps.stdout(`Current: ${formatTemp(currentTemp)}`);
  }
  return EXIT_OK;
}

/**
 * Run the CLI and return the process exit code
 */
export async function cliMain(
  argv: string[],
  deps: CliDeps = createDefaultDeps(),
  cfg: TempdeckConfig = defaultConfig
): Promise<number> {
  let parsed: ParsedCli | "help";
  try {
    parsed = parseCli(argv, cfg);
  } catch (err) {
    deps.stderr(`tempdeck-ctrl: ${errorMessage(err)}`);
    deps.stderr(USAGE);
    return EXIT_USAGE;
  }

  if (parsed === "help") {
    deps.stdout(USAGE);
    return EXIT_OK;
  }

  const { action, selection } = parsed;

  if (action.type === "list") {
    let devices: ConnectedDevice[];
    try {
      devices = await deps.listDevices();
    } catch (err) {
      deps.stderr(`Couldn't list serial ports: ${errorMessage(err)}`);
      return EXIT_FAILURE;
    }
    deps.stderr("Found tempdecks on these ports (serial port name, USB location):");
    for (const { path, location } of devices) {
      deps.stdout(`${path}, ${location ?? "(unknown)"}`);
    }
    return EXIT_OK;
  }

  let td: TempdeckControl;
  try {
    td = await openDevice(selection, deps);
  } catch (err) {
    if (isTempdeckError(err, "device_not_found")) {
      deps.stderr(err.message);
    } else if (isTempdeckError(err)) {
      deps.stderr(`Device ${describeSelection(selection)} did not respond like a tempdeck: ${err.message}`);
    } else {
      deps.stderr(`Couldn't open port ${describeSelection(selection)}: ${errorMessage(err)}`);
    }
    return EXIT_FAILURE;
  }

  let code: number;
  try {
    code = await runAction(action, td, deps);
  } catch (err) {
    deps.stderr(isTempdeckError(err) ? `Device error: ${err.message}` : `Serial port error: ${errorMessage(err)}`);
    code = EXIT_FAILURE;
  }

  try {
    await td.close();
  } catch (err) {
    deps.stderr(`Couldn't close port ${describeSelection(selection)}: ${errorMessage(err)}`);
    code = EXIT_FAILURE;
  }
  return code;
}

/**
 * Real serial-backed dependencies, configured from the environment
 */
export function createDefaultDeps(cfg: TempdeckConfig = defaultConfig): CliDeps {
  const options = {
    usbIds: cfg.USB_IDS,
    baudRate: cfg.BAUD_RATE,
    ackAfterDeactivate: cfg.DEACTIVATE_ACK,
    logger: createLogger("cli", cfg.LOG_LEVEL),
  };

  return {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    prompt: async (question) => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        return await rl.question(question);
      } finally {
        rl.close();
      }
    },
    listDevices: () => TempdeckControl.listConnectedDevices(options),
    openByPort: (path) => TempdeckControl.fromSerialPortname(path, options),
    openByUsb: (location) => TempdeckControl.fromUsbLocation(location, options),
    openFirst: () => TempdeckControl.openFirstDevice(options),
  };
}
