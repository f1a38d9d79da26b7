import { createGate } from "../../src/shared/concurrency/gate";

describe("createGate", () => {
  it("never lets more than `size` tasks run together", async () => {
    const gate = createGate(2);
    let running = 0;
    let peak = 0;

    const page = async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 20));
      running -= 1;
    };

    await Promise.all(Array.from({ length: 10 }, () => gate(page)));
    expect(peak).toBe(2);
  });

  it("starts waiting tasks in arrival order and keeps going after a rejection", async () => {
    const gate = createGate(1);
    const started: number[] = [];

    const results = await Promise.allSettled(
      [1, 2, 3].map((n) =>
        gate(async () => {
          started.push(n);
          if (n === 2) throw new Error("page 2 failed");
          return n;
        })
      )
    );

    expect(started).toEqual([1, 2, 3]);
    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
  });

  it("gives a freed slot to a waiter before a newcomer", async () => {
    const gate = createGate(1);
    const started: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstHeld = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = gate(async () => {
      started.push("first");
      await firstHeld;
    });
    const waiter = gate(async () => {
      started.push("waiter");
    });

    releaseFirst();
    await first;
    const newcomer = gate(async () => {
      started.push("newcomer");
    });
    await Promise.all([waiter, newcomer]);

    expect(started).toEqual(["first", "waiter", "newcomer"]);
  });

  it.each([0, -1, 1.5])("rejects size %p", (size) => {
    expect(() => createGate(size)).toThrow(`Gate size must be a positive integer, got ${size}`);
  });
});
