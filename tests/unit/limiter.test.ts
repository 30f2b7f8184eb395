import { createLimiter } from "../../src/shared/concurrency/limiter";

describe("createLimiter", () => {
  it("limits concurrency", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let maxActive = 0;

    const work = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 20));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 10 }, () => limit(work)));
    expect(maxActive).toBe(2);
  });

  it("passes results and rejections through and keeps draining the queue", async () => {
    const limit = createLimiter(1);

    const results = await Promise.allSettled([
      limit(async () => "first"),
      limit(async () => {
        throw new Error("second failed");
      }),
      limit(async () => "third")
    ]);

    expect(results).toEqual([
      { status: "fulfilled", value: "first" },
      { status: "rejected", reason: new Error("second failed") },
      { status: "fulfilled", value: "third" }
    ]);
  });

  it.each([0, 1.5])("rejects concurrency %p", (concurrency) => {
    expect(() => createLimiter(concurrency)).toThrow("concurrency must be an integer >= 1");
  });
});
