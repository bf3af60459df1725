import { setImmediate } from "node:timers/promises";
import { describe, expect, it, vi } from "vitest";
import { BufferLoggerFactory } from "./BufferLoggerFactory";
import { BufferedLogger } from "./BufferedLogger";

function createDriver() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("BufferedLogger", () => {
  it("writes nothing until the buffer is flushed", () => {
    const driver = createDriver();
    const logger = new BufferedLogger(driver, 50, "allocator");

    logger.log("Number is taken", { scope: "apps" }, "warn");
    expect(driver.warn).not.toHaveBeenCalled();

    logger.flush();
    expect(driver.warn).toHaveBeenCalledWith("Number is taken", {
      scope: "apps",
      label: "allocator",
      ts: expect.any(Number),
    });
  });

  it("drains in chunks on later ticks", async () => {
    const driver = createDriver();
    const logger = new BufferedLogger(driver, 2);

    logger.log("one");
    logger.log("two");
    logger.log("three");

    await setImmediate();
    expect(driver.info).toHaveBeenCalledTimes(2);

    await setImmediate();
    expect(driver.info).toHaveBeenCalledTimes(3);
    expect(driver.info).toHaveBeenLastCalledWith("three", {
      label: undefined,
      ts: expect.any(Number),
    });
  });

  it("drops pending entries on destroy", async () => {
    const driver = createDriver();
    const logger = new BufferedLogger(driver);

    logger.log("lost", {}, "error");
    logger.destroy();
    await setImmediate();

    expect(driver.error).not.toHaveBeenCalled();
  });
});

describe("BufferLoggerFactory", () => {
  it("hands out one logger per label and flushes them together", () => {
    const driver = createDriver();
    const factory = new BufferLoggerFactory(driver);

    expect(factory.create("monitor")).toBe(factory.create("monitor"));
    factory.create("monitor").log("checked");
    factory.create().log("started");
    factory.flushAll();

    expect(driver.info).toHaveBeenCalledWith("checked", expect.objectContaining({ label: "monitor" }));
    expect(driver.info).toHaveBeenCalledWith("started", expect.objectContaining({ label: "global" }));
    factory.destroyAll();
  });
});
