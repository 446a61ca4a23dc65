import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger } from "./logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("prefixes lines with the scope and appends context", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("x").info("hello", { a: 1 });
    expect(spy).toHaveBeenCalledWith("[x]", "hello", { a: 1 });
  });

  it("omits empty context", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("x").warn("careful", {});
    expect(spy).toHaveBeenCalledWith("[x]", "careful");
  });

  it("drops debug lines outside development", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    createLogger("x").debug("noise");
    expect(spy).not.toHaveBeenCalled();
  });
});
