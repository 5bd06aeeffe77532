import { afterEach, describe, expect, test, vi } from "vitest";
import { log } from "./log";

describe("log", () => {
  const initialLevel = log.getLevel();

  afterEach(() => {
    log.setLevel(initialLevel);
    vi.restoreAllMocks();
  });

  test("messages below the level are dropped", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    log.setLevel("warn");
    log.debug("hidden");
    log.warn("careful", 3);
    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0].slice(1)).toEqual(["careful", 3]);
  });

  test("debug mode follows the level", () => {
    log.setLevel("debug");
    expect(log.isDebugMode()).toBe(true);
    log.setLevel("info");
    expect(log.isDebugMode()).toBe(false);
  });

  test("a closed pipe is ignored", () => {
    vi.spyOn(console, "error").mockImplementation(() => {
      throw Object.assign(new Error("write EPIPE"), { code: "EPIPE" });
    });
    expect(() => log.error("lost")).not.toThrow();
  });

  test("other write failures propagate", () => {
    vi.spyOn(console, "error").mockImplementation(() => {
      throw new Error("disk full");
    });
    expect(() => log.error("lost")).toThrow("disk full");
  });
});
