/**
 * Tests for the serial controller protocol, against an in-memory link.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { SerialTransport, type SerialLink } from "../src/display/serial-transport.js";
import { FALLBACK_WIDTH } from "../src/display/transport.js";
import { isFlapError } from "../src/errors.js";
import { DisplayPrinter } from "../src/display/printer.js";
import { FakeClock } from "./fakes.js";

/** Fake controller: greets on open and reports the written text as flap state. */
class FakeController implements SerialLink {
  readonly path = "/dev/ttyFAKE0";
  written: string[] = [];
  open_ = false;
  greeting: string[] = [JSON.stringify({ type: "init", num_modules: 6 })];
  answerWrites = true;
  failOpen = false;
  /** "unplug" drops the port during the next write; "reject" fails it with the port still open. */
  writeFailure: "unplug" | "reject" | null = null;
  private listeners: Array<(line: string) => void> = [];

  isOpen(): boolean { return this.open_; }

  async open(): Promise<void> {
    if (this.failOpen) throw new Error("permission denied");
    this.open_ = true;
    for (const line of this.greeting) this.emit(line);
  }

  async close(): Promise<void> { this.open_ = false; }

  async writeLine(line: string): Promise<void> {
    this.written.push(line);
    if (this.writeFailure === "unplug") {
      this.open_ = false;
      throw new Error("device unplugged");
    }
    if (this.writeFailure === "reject") throw new Error("write timeout");
    if (!this.answerWrites) return;
    const modules = [...line.slice(1)].map((flap) => ({ flap }));
    this.emit(JSON.stringify({ type: "status", modules }));
  }

  onLine(listener: (line: string) => void): void {
    this.listeners.push(listener);
  }

  emit(line: string): void {
    for (const l of this.listeners) l(line);
  }
}

describe("SerialTransport", () => {
  test("learns the module count from the init line", async () => {
    const link = new FakeController();
    const t = new SerialTransport(link);
    assert.strictEqual(t.width(), FALLBACK_WIDTH);
    await t.open();
    assert.strictEqual(t.isAttached(), true);
    assert.strictEqual(t.width(), 6);
    await t.close();
  });

  test("ignores log chatter and NUL padding before init", async () => {
    const link = new FakeController();
    link.greeting = ["booting...", "\0\0" + JSON.stringify({ type: "init", num_modules: 4 })];
    const t = new SerialTransport(link);
    await t.open();
    assert.strictEqual(t.width(), 4);
    await t.close();
  });

  test("writes text commands and reads back the flap state", async () => {
    const link = new FakeController();
    const t = new SerialTransport(link);
    await t.open();
    await t.write("hello ");
    assert.deepStrictEqual(link.written, ["=hello "]);
    assert.strictEqual(t.readCurrentText(), "hello ");
    await t.close();
  });

  test("a missing status reply only warns", async () => {
    const link = new FakeController();
    link.answerWrites = false;
    const t = new SerialTransport(link, { statusTimeoutMs: 20 });
    await t.open();
    await t.write("abc");
    assert.deepStrictEqual(link.written, ["=abc"]);
    // No status yet, so the last written text stands in
    assert.strictEqual(t.readCurrentText(), "abc");
    await t.close();
  });

  test("fails to open when no controller answers", async () => {
    const link = new FakeController();
    link.greeting = [];
    const t = new SerialTransport(link, { initTimeoutMs: 20 });
    await assert.rejects(
      () => t.open(),
      (e: unknown) => isFlapError(e) && e.kind === "transport_error" && /no split-flap controller/.test(e.message),
    );
    assert.strictEqual(t.isAttached(), false);
  });

  test("wraps port open failures", async () => {
    const link = new FakeController();
    link.failOpen = true;
    const t = new SerialTransport(link);
    await assert.rejects(
      () => t.open(),
      (e: unknown) =>
        isFlapError(e) && e.message === "could not open serial port /dev/ttyFAKE0: permission denied",
    );
  });

  test("does not write while detached", async () => {
    const link = new FakeController();
    const t = new SerialTransport(link);
    await t.write("abc");
    assert.deepStrictEqual(link.written, []);
    assert.strictEqual(t.readCurrentText(), "abc");
  });

  test("a device that drops mid-write leaves the display detached", async () => {
    const link = new FakeController();
    const t = new SerialTransport(link);
    await t.open();
    const printer = new DisplayPrinter(t, { clock: new FakeClock() });
    link.writeFailure = "unplug";
    await printer.print("hello", "left", 0);
    assert.strictEqual(t.isAttached(), false);
    assert.strictEqual(printer.currentText(), "hello ");

    await printer.print("again", "left", 0);
    assert.deepStrictEqual(link.written, ["=hello "]);
    // Detached layout falls back to the default width
    assert.strictEqual(printer.currentText(), "again   ");
  });

  test("a failed write on a port that is still open is a transport error", async () => {
    const link = new FakeController();
    const t = new SerialTransport(link);
    await t.open();
    link.writeFailure = "reject";
    await assert.rejects(
      () => t.write("hello "),
      (e: unknown) =>
        isFlapError(e) && e.kind === "transport_error" &&
        e.message === "write to /dev/ttyFAKE0 failed: write timeout",
    );
    assert.strictEqual(t.isAttached(), true);
    await t.close();
  });
});
