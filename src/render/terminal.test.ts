import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";

import { routeExitEvents, translateKey } from "./terminal.js";

const mods = { ctrl: false, meta: false, shift: false };

describe("translateKey", () => {
  it("names printable keys by their character", () => {
    expect(translateKey("a", { name: "a", ...mods })).toEqual({
      name: "a",
      ch: "a",
      ...mods,
    });
    expect(translateKey("A", { name: "a", ...mods, shift: true })?.name).toBe("A");
    expect(translateKey('"', { ...mods })?.name).toBe('"');
    expect(translateKey("$", undefined)?.name).toBe("$");
  });

  it("keeps names for control keys", () => {
    expect(translateKey("\r", { name: "return", ...mods })).toEqual({
      name: "enter",
      ch: undefined,
      ...mods,
    });
    expect(translateKey("\x7f", { name: "backspace", ...mods })?.name).toBe("backspace");
    expect(translateKey("\t", { name: "tab", ...mods })?.name).toBe("tab");
  });

  it("keeps space named but typeable", () => {
    expect(translateKey(" ", { name: "space", ...mods })).toEqual({
      name: "space",
      ch: " ",
      ...mods,
    });
  });

  it("keeps modifier flags and the base key name", () => {
    expect(translateKey("\x11", { name: "q", ...mods, ctrl: true })).toEqual({
      name: "q",
      ch: undefined,
      ...mods,
      ctrl: true,
    });
    expect(translateKey("a", { name: "a", ...mods, meta: true })?.name).toBe("a");
  });

  it("drops events without a name or character", () => {
    expect(translateKey(undefined, undefined)).toBeNull();
  });
});

describe("routeExitEvents", () => {
  it("shuts down on SIGTERM, uncaught exceptions and unhandled rejections", () => {
    const proc = new EventEmitter();
    const shutdown = vi.fn((_error?: unknown) => {});
    routeExitEvents(proc, shutdown);

    proc.emit("SIGTERM");
    expect(shutdown).toHaveBeenLastCalledWith();

    const crash = new Error("widget blew up");
    proc.emit("uncaughtException", crash);
    expect(shutdown).toHaveBeenLastCalledWith(crash);

    proc.emit("unhandledRejection", "lost");
    expect(shutdown).toHaveBeenLastCalledWith("lost");

    proc.emit("unhandledRejection", undefined);
    expect(shutdown).toHaveBeenLastCalledWith(new Error("Unhandled promise rejection"));
    expect(shutdown).toHaveBeenCalledTimes(4);
  });
});
