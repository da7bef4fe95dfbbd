import { describe, expect, it, vi } from "vitest";
import { CancellationController } from "./CancellationController";

describe("CancellationController", () => {
  it("kills the process group of the tracked process on cancel", () => {
    const killGroup = vi.fn();
    const controller = new CancellationController(killGroup);
    const child = { pid: 4242 };

    const release = controller.track(child);
    expect(controller.hasActiveProcess()).toBe(true);

    controller.cancel("SIGINT");
    expect(controller.isCancellationRequested).toBe(true);
    expect(controller.signal.aborted).toBe(true);
    expect(controller.cancellationReason).toBe("SIGINT");
    expect(killGroup).toHaveBeenCalledWith(4242, "SIGTERM");

    release();
    expect(controller.hasActiveProcess()).toBe(false);
  });

  it("forces the kill on a second cancel", () => {
    const killGroup = vi.fn();
    const controller = new CancellationController(killGroup);
    controller.track({ pid: 7 });

    controller.cancel("SIGINT");
    controller.cancel("SIGINT");
    expect(killGroup.mock.calls).toEqual([
      [7, "SIGTERM"],
      [7, "SIGKILL"]
    ]);
    expect(controller.cancellationReason).toBe("SIGINT");
  });

  it("escalates to SIGKILL when the group outlives the grace period", async () => {
    const killGroup = vi.fn();
    const controller = new CancellationController(killGroup, 20);
    controller.track({ pid: 8 });

    controller.cancel();
    expect(killGroup.mock.calls).toEqual([[8, "SIGTERM"]]);
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(killGroup.mock.calls).toEqual([
      [8, "SIGTERM"],
      [8, "SIGKILL"]
    ]);
  });

  it("does not escalate once the process was released", async () => {
    const killGroup = vi.fn();
    const controller = new CancellationController(killGroup, 20);
    const release = controller.track({ pid: 9 });

    controller.cancel();
    release();
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(killGroup.mock.calls).toEqual([[9, "SIGTERM"]]);
  });

  it("terminates a process registered after cancellation", () => {
    const killGroup = vi.fn();
    const controller = new CancellationController(killGroup);
    controller.cancel();

    controller.track({ pid: 99 });
    expect(killGroup).toHaveBeenCalledWith(99, "SIGTERM");
  });

  it("does not signal once the process was released", () => {
    const killGroup = vi.fn();
    const controller = new CancellationController(killGroup);
    const release = controller.track({ pid: 5 });
    release();

    controller.cancel();
    expect(killGroup).not.toHaveBeenCalled();
  });

  it("tolerates a process group that already exited", () => {
    const controller = new CancellationController(() => {
      throw new Error("kill ESRCH");
    });
    controller.track({ pid: 11 });
    expect(() => controller.cancel()).not.toThrow();
  });

  it("sleeps in slices and stops early on cancel", async () => {
    const controller = new CancellationController(vi.fn());
    await expect(controller.sleep(0.02, 5)).resolves.toBe(true);

    setTimeout(() => controller.cancel(), 20);
    const start = Date.now();
    await expect(controller.sleep(5, 10)).resolves.toBe(false);
    expect(Date.now() - start).toBeLessThan(2000);
  });
});
