import { describe, it, expect, afterEach, vi } from "vitest";
import { config, createLogger } from "@decimatrix/core";

describe("createLogger", () => {
  afterEach(() => {
    config.reset();
    vi.restoreAllMocks();
  });

  it("suppresses debug lines while debug is off", () => {
    const lines: string[] = [];
    const log = createLogger("test", { writer: (line) => lines.push(line) });

    log.debug("hidden");
    expect(lines).toEqual([]);
  });

  it("prefixes debug lines with the scope once debug is on", () => {
    const lines: string[] = [];
    const log = createLogger("reduction", { writer: (line) => lines.push(line) });

    config.set({ debug: true });
    log.debug("swapped rows 1 and 2");
    expect(lines).toEqual(["[decimatrix:reduction] swapped rows 1 and 2"]);
  });

  it("always writes warnings", () => {
    const lines: string[] = [];
    const log = createLogger("matrix", { writer: (line) => lines.push(line) });

    log.warn("careful");
    expect(lines).toEqual(["[decimatrix:matrix] warning: careful"]);
    expect(log.scope).toBe("matrix");
  });

  it("writes to the console by default", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("render").warn("wide column");
    expect(spy).toHaveBeenCalledWith("[decimatrix:render] warning: wide column");
  });
});
