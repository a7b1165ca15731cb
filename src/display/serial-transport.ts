/**
 * Live split-flap controller over a serial port.
 *
 * Wire protocol (newline-delimited, 38400 baud by default):
 *   controller -> host  {"type":"init","num_modules":12}
 *   controller -> host  {"type":"status","modules":[{"flap":"a",...},...]}
 *   host -> controller  =<text>
 *
 * The controller announces itself with an init line when the port opens
 * (the board resets on connect) and answers every text command with a
 * status line once the modules have settled.
 */
import { SerialPort, ReadlineParser } from "serialport";
import { z } from "zod";
import { Logger, C } from "../logger.js";
import { asError, flapError } from "../errors.js";
import {
  DEFAULT_ALPHABET,
  DEFAULT_BAUD_RATE,
  FALLBACK_WIDTH,
  alphabetSet,
  type DisplayTransport,
} from "./transport.js";

/** Line-oriented view of a serial port. */
export interface SerialLink {
  readonly path: string;
  isOpen(): boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  writeLine(line: string): Promise<void>;
  onLine(listener: (line: string) => void): void;
}

export function openSerialLink(path: string, baudRate = DEFAULT_BAUD_RATE): SerialLink {
  const port = new SerialPort({ path, baudRate, autoOpen: false });
  const parser = port.pipe(new ReadlineParser({ delimiter: "\n" }));
  // Write and open failures also reach the callbacks below
  port.on("error", (err: Error) => Logger.warn(C.yellow(`serial port ${path}: ${err.message}`)));

  return {
    path,
    isOpen: () => port.isOpen,
    open: () =>
      new Promise<void>((resolve, reject) => {
        port.open((err) => (err ? reject(err) : resolve()));
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) return resolve();
        port.close((err) => (err ? reject(err) : resolve()));
      }),
    writeLine: (line: string) =>
      new Promise<void>((resolve, reject) => {
        port.write(`${line}\n`, (err) => {
          if (err) return reject(err);
          port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
        });
      }),
    onLine: (listener) => {
      parser.on("data", (chunk: Buffer | string) => listener(chunk.toString()));
    },
  };
}

const initMessage = z.object({
  type: z.literal("init"),
  num_modules: z.number().int().nonnegative(),
});

const statusMessage = z.object({
  type: z.literal("status"),
  modules: z.array(z.object({ flap: z.string() })),
});

const controllerMessage = z.discriminatedUnion("type", [initMessage, statusMessage]);

type ControllerMessage = z.infer<typeof controllerMessage>;
type MessageType = ControllerMessage["type"];

interface Waiter {
  type: MessageType;
  timer: ReturnType<typeof setTimeout>;
  resolve: (msg: ControllerMessage | null) => void;
}

export interface SerialTransportOptions {
  alphabet?: string;
  /** How long to wait for the init line after opening. */
  initTimeoutMs?: number;
  /** How long to wait for the status line after a write. */
  statusTimeoutMs?: number;
}

export class SerialTransport implements DisplayTransport {
  private numModules = 0;
  private flaps: string | null = null;
  private lastWritten = "";
  private opened = false;
  private waiters: Waiter[] = [];
  private readonly characters: ReadonlySet<string>;
  private readonly initTimeoutMs: number;
  private readonly statusTimeoutMs: number;

  constructor(private readonly link: SerialLink, opts: SerialTransportOptions = {}) {
    this.characters = alphabetSet(opts.alphabet ?? DEFAULT_ALPHABET);
    this.initTimeoutMs = opts.initTimeoutMs ?? 10_000;
    this.statusTimeoutMs = opts.statusTimeoutMs ?? 15_000;
    link.onLine((line) => this.handleLine(line));
  }

  isAttached(): boolean {
    return this.opened && this.link.isOpen();
  }

  width(): number {
    return this.isAttached() && this.numModules > 0 ? this.numModules : FALLBACK_WIDTH;
  }

  supportedCharacters(): ReadonlySet<string> {
    return this.characters;
  }

  readCurrentText(): string {
    if (this.isAttached() && this.flaps !== null) return this.flaps;
    return this.lastWritten;
  }

  async open(): Promise<void> {
    // Listen before opening: the init line arrives as soon as the board boots
    const init = this.nextMessage("init", this.initTimeoutMs);
    try {
      await this.link.open();
    } catch (e: unknown) {
      this.dropWaiters();
      throw flapError("transport_error", `could not open serial port ${this.link.path}: ${asError(e).message}`, { cause: e });
    }
    if (!(await init) || this.numModules === 0) {
      throw flapError("transport_error", `no split-flap controller answered on ${this.link.path}`);
    }
    this.opened = true;
    Logger.info(C.gray(`display ready on ${this.link.path} (${this.numModules} modules)`));
  }

  async write(text: string): Promise<void> {
    this.lastWritten = text;
    if (!this.isAttached()) return;

    const status = this.nextMessage("status", this.statusTimeoutMs);
    try {
      await this.link.writeLine(`=${text}`);
    } catch (e: unknown) {
      this.dropWaiters();
      if (!this.link.isOpen()) {
        // The device went away; carry on without it
        this.opened = false;
        Logger.warn(C.yellow(`display on ${this.link.path} disconnected (${asError(e).message}), continuing detached`));
        return;
      }
      throw flapError("transport_error", `write to ${this.link.path} failed: ${asError(e).message}`, { cause: e });
    }
    if (!(await status)) {
      Logger.warn(C.yellow(`display did not report status after writing '${text}'`));
    }
  }

  async close(): Promise<void> {
    this.opened = false;
    this.dropWaiters();
    try {
      await this.link.close();
    } catch (e: unknown) {
      Logger.warn(`closing ${this.link.path} failed: ${asError(e).message}`);
    }
  }

  private handleLine(raw: string): void {
    const line = raw.replace(/^\0+/, "").trim();
    if (!line) return;
    if (!line.startsWith("{")) {
      Logger.debug(`display: ${line}`);
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (e: unknown) {
      Logger.warn(`unreadable line from display: ${asError(e).message}`);
      return;
    }

    const parsed = controllerMessage.safeParse(json);
    if (!parsed.success) {
      Logger.debug(`display: ignoring ${line}`);
      return;
    }

    const msg = parsed.data;
    if (msg.type === "init") {
      if (this.opened) Logger.warn(C.yellow("display reset detected"));
      this.numModules = msg.num_modules;
      this.flaps = null;
    } else {
      this.flaps = msg.modules.map((m) => m.flap).join("");
    }

    const ready = this.waiters.filter((w) => w.type === msg.type);
    this.waiters = this.waiters.filter((w) => w.type !== msg.type);
    for (const w of ready) {
      clearTimeout(w.timer);
      w.resolve(msg);
    }
  }

  /** Resolves with the next message of `type`, or null after the timeout. */
  private nextMessage(type: MessageType, timeoutMs: number): Promise<ControllerMessage | null> {
    return new Promise((resolve) => {
      const waiter: Waiter = {
        type,
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(null);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private dropWaiters(): void {
    for (const w of this.waiters) {
      clearTimeout(w.timer);
      w.resolve(null);
    }
    this.waiters = [];
  }
}

export interface SerialPortEntry {
  path: string;
  manufacturer?: string;
  pnpId?: string;
}

export async function listSerialPorts(): Promise<SerialPortEntry[]> {
  const ports = await SerialPort.list();
  return ports.map((p) => ({ path: p.path, manufacturer: p.manufacturer, pnpId: p.pnpId }));
}
