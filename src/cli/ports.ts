/**
 * Serial port selection for --port.
 */

import { basename } from "node:path";
import { Logger, C } from "../logger.js";
import { flapError } from "../errors.js";
import type { SerialPortEntry } from "../display/serial-transport.js";

export function formatPortList(ports: readonly SerialPortEntry[]): string {
  const lines = ports.map((p, i) =>
    `[${String(i + 1).padStart(2)}] ${p.path}${p.manufacturer ? ` - ${p.manufacturer}` : ""}`,
  );
  return ["available serial ports:", ...lines].join("\n");
}

/** Ports backed by a real device; built-in UARTs such as /dev/ttyS0 report neither field. */
export function describedPorts(ports: readonly SerialPortEntry[]): SerialPortEntry[] {
  return ports.filter((p) => Boolean(p.manufacturer || p.pnpId));
}

/**
 * Pick a port from the described `ports`, sorted by path. `key` matches a
 * device path or its base name first, then a 1-based index; with no key,
 * or no match, the first port is used.
 */
export function resolveSerialPort(key: string | null, ports: readonly SerialPortEntry[]): string {
  const sorted = describedPorts(ports).sort((a, b) => a.path.localeCompare(b.path));
  if (sorted.length === 0) {
    throw flapError("config_error", "no serial ports found on the system (use --demo to run without a display)");
  }

  if (key !== null) {
    const byName = sorted.find((p) => p.path === key || basename(p.path) === key);
    if (byName) {
      Logger.info(C.gray(`using specified serial port '${byName.path}'`));
      return byName.path;
    }

    const index = /^\d+$/.test(key) ? Number(key) : NaN;
    if (index >= 1 && index <= sorted.length) {
      const path = sorted[index - 1].path;
      Logger.info(C.gray(`using indexed serial port '${path}' (${index}/${sorted.length})`));
      return path;
    }
    Logger.warn(C.yellow(`specified serial port '${key}' not found`));
  }

  Logger.info(formatPortList(sorted));
  Logger.info(C.gray(`using default serial port '${sorted[0].path}'`));
  return sorted[0].path;
}
