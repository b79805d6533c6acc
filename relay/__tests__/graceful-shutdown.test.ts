import { GracefulShutdown } from "../graceful-shutdown";
import { silentLogger } from "./helpers/test-kit";

describe("GracefulShutdown", () => {
  it("should run cleanups in registration order and resolve shutdownComplete", async () => {
    const shutdown = new GracefulShutdown(silentLogger(), { exitOnComplete: false });
    const order: string[] = [];
    shutdown.registerCleanup("bridge", async () => {
      order.push("bridge");
    });
    shutdown.registerCleanup("health", () => {
      order.push("health");
    });

    await shutdown.initiateShutdown();
    await shutdown.shutdownComplete;

    expect(order).toEqual(["bridge", "health"]);
    expect(shutdown.isShuttingDown).toBe(true);
  });

  it("should keep going after a cleanup fails", async () => {
    const logger = silentLogger();
    const errorSpy = jest.spyOn(logger, "error");
    const shutdown = new GracefulShutdown(logger, { exitOnComplete: false });
    const health = jest.fn();
    shutdown.registerCleanup("bridge", () => {
      throw new Error("boom");
    });
    shutdown.registerCleanup("health", health);

    await shutdown.initiateShutdown();

    expect(errorSpy).toHaveBeenCalledWith('Cleanup "bridge" failed: boom');
    expect(health).toHaveBeenCalledTimes(1);
  });

  it("should give up on a cleanup that outlives its share of the timeout", async () => {
    const logger = silentLogger();
    const warnSpy = jest.spyOn(logger, "warn");
    const shutdown = new GracefulShutdown(logger, { timeoutMs: 40, exitOnComplete: false });
    const health = jest.fn();
    shutdown.registerCleanup("bridge", () => new Promise<void>(() => undefined));
    shutdown.registerCleanup("health", health);

    await shutdown.initiateShutdown();

    expect(warnSpy).toHaveBeenCalledWith('Cleanup "bridge" timed out after 20ms');
    expect(health).toHaveBeenCalledTimes(1);
  });

  it("should ignore a second shutdown request", async () => {
    const shutdown = new GracefulShutdown(silentLogger(), { exitOnComplete: false });
    const cleanup = jest.fn();
    shutdown.registerCleanup("bridge", cleanup);

    await Promise.all([shutdown.initiateShutdown(), shutdown.initiateShutdown(1)]);

    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});
