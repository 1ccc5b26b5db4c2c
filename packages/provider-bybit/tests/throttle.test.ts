/**
 * @fileoverview Tests for the request throttle.
 */

import { describe, it, expect, vi } from "vitest";
import { RequestThrottle, sleep } from "../src/throttle.js";

describe("RequestThrottle", () => {
  it("should space successive requests by the minimum interval", async () => {
    const wait = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const throttle = new RequestThrottle(100, wait, () => 1000);

    await throttle.acquire();
    await throttle.acquire();
    await throttle.acquire();

    expect(wait.mock.calls.map((call) => call[0])).toEqual([100, 200]);
  });

  it("should not wait once the interval has passed", async () => {
    const wait = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    let clock = 0;
    const throttle = new RequestThrottle(100, wait, () => clock);

    await throttle.acquire();
    clock = 250;
    await throttle.acquire();

    expect(wait).not.toHaveBeenCalled();
  });
});

describe("sleep", () => {
  it("should reject with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error("stopped"));
    await expect(pending).rejects.toThrow("stopped");
  });
});
