import { describe, it, expect } from "vitest";
import { createProviderBudget } from "./providerBudget";

describe("createProviderBudget", () => {
  it("grants permits up to its size and queues the rest", async () => {
    const budget = createProviderBudget(2);

    const first = await budget.acquire();
    await budget.acquire();
    const third = budget.acquire();

    expect(budget.getActiveCount()).toBe(2);
    expect(budget.getWaitingCount()).toBe(1);

    first();
    await third;

    expect(budget.getActiveCount()).toBe(2);
    expect(budget.getWaitingCount()).toBe(0);
  });

  it("serves waiters in arrival order", async () => {
    const budget = createProviderBudget(1);
    const order: string[] = [];

    const first = await budget.acquire();
    const second = budget.acquire().then((release) => {
      order.push("second");
      return release;
    });
    const third = budget.acquire().then((release) => {
      order.push("third");
      return release;
    });

    first();
    const releaseSecond = await second;
    expect(order).toEqual(["second"]);

    releaseSecond();
    const releaseThird = await third;
    expect(order).toEqual(["second", "third"]);

    releaseThird();
    expect(budget.getActiveCount()).toBe(0);
  });

  it("drops a waiter whose signal aborts", async () => {
    const budget = createProviderBudget(1);
    const release = await budget.acquire();
    const controller = new AbortController();

    const pending = budget.acquire(controller.signal);
    controller.abort(new Error("stop waiting"));

    await expect(pending).rejects.toThrow("stop waiting");
    expect(budget.getWaitingCount()).toBe(0);

    release();
    expect(budget.getActiveCount()).toBe(0);
  });

  it("ignores a second release of the same permit", async () => {
    const budget = createProviderBudget(2);
    const release = await budget.acquire();
    await budget.acquire();

    release();
    release();

    expect(budget.getActiveCount()).toBe(1);
  });

  it("rejects a size below one", () => {
    expect(() => createProviderBudget(0)).toThrow(RangeError);
  });
});
