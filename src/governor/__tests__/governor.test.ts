import { describe, it, expect } from "vitest";
import { ConcurrencyGovernor } from "../governor.js";
import { RequestAbortedError } from "../../errors.js";
import { deferred, tick } from "../../__tests__/helpers/fakes.js";

describe("ConcurrencyGovernor", () => {
  describe("admit", () => {
    it("should never hold more slots than the limit", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 2, hostDelayMs: 0 });

      const first = await governor.admit();
      const second = await governor.admit();
      let thirdAdmitted = false;
      const third = governor.admit().then((token) => {
        thirdAdmitted = true;
        return token;
      });

      await tick(10);
      expect(governor.activeCount).toBe(2);
      expect(thirdAdmitted).toBe(false);

      first.release();
      (await third).release();
      second.release();

      expect(thirdAdmitted).toBe(true);
    });

    it("should admit waiters in arrival order", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 1, hostDelayMs: 0 });
      const order: string[] = [];

      const holder = await governor.admit();
      const waiters = ["a", "b", "c"].map((name) =>
        governor.admit().then((token) => {
          order.push(name);
          token.release();
        })
      );

      holder.release();
      await Promise.all(waiters);

      expect(order).toEqual(["a", "b", "c"]);
    });

    it("should reject a cancelled waiter and pass its turn on", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 1, hostDelayMs: 0 });
      const controller = new AbortController();

      const holder = await governor.admit();
      const cancelled = governor.admit(controller.signal);
      const next = governor.admit();

      controller.abort();
      await expect(cancelled).rejects.toBeInstanceOf(RequestAbortedError);

      holder.release();
      const token = await next;
      expect(governor.activeCount).toBe(1);
      token.release();
    });

    it("should reject at once when the signal is already aborted", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 1, hostDelayMs: 0 });
      const controller = new AbortController();
      controller.abort();

      await expect(governor.admit(controller.signal)).rejects.toThrow(
        "Request aborted: cancelled while waiting for a slot"
      );
      expect(governor.pendingCount).toBe(0);
    });

    it("should ignore a second release of the same token", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 1, hostDelayMs: 0 });

      const first = await governor.admit();
      const second = governor.admit();
      first.release();
      const held = await second;
      first.release();

      let thirdAdmitted = false;
      const third = governor.admit().then((token) => {
        thirdAdmitted = true;
        return token;
      });
      await tick(10);
      expect(thirdAdmitted).toBe(false);

      held.release();
      (await third).release();
    });
  });

  describe("pace", () => {
    it("should space attempt starts against the same host", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 5, hostDelayMs: 50 });

      await governor.pace("shop.example");
      const started = Date.now();
      await governor.pace("shop.example");

      expect(Date.now() - started).toBeGreaterThanOrEqual(40);
    });

    it("should not pace different hosts against each other", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 5, hostDelayMs: 200 });

      await governor.pace("a.example");
      const started = Date.now();
      await governor.pace("b.example");

      expect(Date.now() - started).toBeLessThan(100);
    });

    it("should forget hosts once their delay has passed", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 5, hostDelayMs: 20 });

      await governor.pace("a.example");
      await governor.pace("b.example");
      expect(governor.pacedHostCount).toBe(2);

      await tick(30);
      await governor.pace("c.example");
      expect(governor.pacedHostCount).toBe(1);
    });

    it("should stop waiting when the signal fires", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 5, hostDelayMs: 5000 });
      const controller = new AbortController();

      await governor.pace("shop.example");
      const waiting = governor.pace("shop.example", controller.signal);
      controller.abort();

      await expect(waiting).rejects.toThrow("Request aborted: cancelled while pacing");
    });
  });

  describe("withSlot", () => {
    it("should release the slot when the work throws", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 1, hostDelayMs: 0 });

      await expect(
        governor.withSlot("shop.example", undefined, async () => {
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      await tick(0);
      expect(governor.activeCount).toBe(0);
      await expect(governor.withSlot("shop.example", undefined, async () => "ok")).resolves.toBe("ok");
    });

    it("should space starts against the same host", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 2, hostDelayMs: 50 });
      const starts: number[] = [];

      await Promise.all([
        governor.withSlot("shop.example", undefined, async () => starts.push(Date.now())),
        governor.withSlot("shop.example", undefined, async () => starts.push(Date.now())),
      ]);

      expect(starts).toHaveLength(2);
      expect((starts[1] ?? 0) - (starts[0] ?? 0)).toBeGreaterThanOrEqual(40);
    });

    it("should give the slot to other hosts while a paced attempt waits", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 1, hostDelayMs: 200 });
      const order: string[] = [];

      await governor.withSlot("a.example", undefined, async () => order.push("a1"));
      const pacedSecond = governor.withSlot("a.example", undefined, async () => order.push("a2"));
      await tick(10);
      expect(governor.activeCount).toBe(0);

      await governor.withSlot("b.example", undefined, async () => order.push("b1"));
      expect(order).toEqual(["a1", "b1"]);

      await pacedSecond;
      expect(order).toEqual(["a1", "b1", "a2"]);
    });

    it("should count the running attempt as active", async () => {
      const governor = new ConcurrencyGovernor({ maxConcurrent: 2, hostDelayMs: 0 });
      const gate = deferred<string>();

      const running = governor.withSlot("shop.example", undefined, () => gate.promise);
      await tick(0);
      expect(governor.activeCount).toBe(1);

      gate.resolve("done");
      await expect(running).resolves.toBe("done");
    });
  });
});
