/**
 * Tests for DisplayPrinter paging, de-duplication and stat layout.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { DisplayPrinter } from "../src/display/printer.js";
import { DetachedTransport } from "../src/display/transport.js";
import { isFlapError } from "../src/errors.js";
import { FakeClock, RecordingTransport } from "./fakes.js";

const SUBS = ["Subscribers", "Subs", "Sub"];

async function attached(modules = 8) {
  const transport = new RecordingTransport(modules);
  await transport.open();
  const clock = new FakeClock();
  return { transport, clock, printer: new DisplayPrinter(transport, { clock }) };
}

describe("setText", () => {
  test("writes the filtered, aligned line", async () => {
    const { transport, printer } = await attached();
    await printer.setText("Hi!", "right");
    assert.deepStrictEqual(transport.writes, ["     hi?"]);
    assert.strictEqual(printer.currentText(), "     hi?");
  });

  test("skips a write when the display already shows the line", async () => {
    const { transport, printer } = await attached();
    await printer.setText("Hi");
    await printer.setText("hi");
    assert.deepStrictEqual(transport.writes, ["hi      "]);
  });

  test("detached displays are never written", async () => {
    const transport = new DetachedTransport({ width: 6 });
    const printer = new DisplayPrinter(transport, { clock: new FakeClock() });
    await printer.setText("demo");
    assert.strictEqual(transport.readCurrentText(), "");
    assert.strictEqual(printer.currentText(), "demo  ");
    assert.strictEqual(printer.width, 6);
  });

  test("a display without cells is a layout error", async () => {
    const printer = new DisplayPrinter(new DetachedTransport({ width: 0 }), { clock: new FakeClock() });
    await assert.rejects(
      () => printer.print("x"),
      (e: unknown) => isFlapError(e) && e.kind === "layout_error",
    );
  });
});

describe("print", () => {
  test("pages long text and dwells after each page", async () => {
    const { transport, clock, printer } = await attached();
    await printer.print("the quick brown fox");
    assert.deepStrictEqual(transport.writes, ["the     ", "quick   ", "brown   ", "fox     "]);
    assert.deepStrictEqual(clock.sleeps, [2, 2, 2, 2]);
  });

  test("numbers are shortened to the width", async () => {
    const { transport, printer } = await attached();
    await printer.print(1234, "right", 0);
    assert.deepStrictEqual(transport.writes, ["    1234"]);
  });

  test("clear blanks the display without dwelling", async () => {
    const { transport, clock, printer } = await attached();
    await printer.print("x", "left", 0);
    await printer.clear();
    assert.deepStrictEqual(transport.writes, ["x       ", "        "]);
    assert.deepStrictEqual(clock.sleeps, []);
  });
});

describe("printStat", () => {
  test("flashes the label, then shows label and value together", async () => {
    const { transport, clock, printer } = await attached();
    await printer.printStat(SUBS, 123);
    assert.deepStrictEqual(transport.writes, ["subs    ", "subs 123"]);
    assert.deepStrictEqual(clock.sleeps, [0.75, 2]);
  });

  test("no label flash while a label is already on screen", async () => {
    const { transport, printer } = await attached();
    await printer.printStat(SUBS, 123);
    await printer.printStat(SUBS, 124);
    assert.deepStrictEqual(transport.writes, ["subs    ", "subs 123", "subs 124"]);
  });

  test("left alignment puts the value first", async () => {
    const { transport, printer } = await attached();
    await printer.printStat("Vids", 12, { alignment: "left", dwell: 0 });
    assert.deepStrictEqual(transport.writes, ["    vids", "12  vids"]);
  });

  test("twoStep off skips the flash", async () => {
    const { transport, printer } = await attached();
    await printer.printStat("Vids", 12, { twoStep: false });
    assert.deepStrictEqual(transport.writes, ["vids  12"]);
  });

  test("label and value get a page each when they do not fit together", async () => {
    const { transport, clock, printer } = await attached();
    await printer.printStat("Views", 12345678);
    assert.deepStrictEqual(transport.writes, ["views   ", "12345678"]);
    assert.deepStrictEqual(clock.sleeps, [2, 2]);
  });

  test("twoStep off shows only the value when label and value do not fit together", async () => {
    const { transport, clock, printer } = await attached();
    await printer.printStat("Views", 12345678, { twoStep: false });
    assert.deepStrictEqual(transport.writes, ["12345678"]);
    assert.deepStrictEqual(clock.sleeps, [2]);
  });

  test("without labels only the value is shown", async () => {
    const { transport, printer } = await attached();
    await printer.printStat(null, 42);
    assert.deepStrictEqual(transport.writes, ["      42"]);
  });
});
