import { expect } from "chai";

import { AsyncMutex } from "../../utils/mutex";

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("AsyncMutex", () => {
  it("should run sections one after the other", async () => {
    const mutex = new AsyncMutex();
    const steps: string[] = [];

    await Promise.all([
      mutex.runExclusive(async () => {
        steps.push("a:start");
        await tick();
        steps.push("a:end");
      }),
      mutex.runExclusive(async () => {
        steps.push("b:start");
        await tick();
        steps.push("b:end");
      }),
    ]);

    expect(steps).to.deep.equal(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("should release the lock when a section throws", async () => {
    const mutex = new AsyncMutex();

    const failed = mutex.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(async () => "done");

    let message = "";

    try {
      await failed;
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }
    expect(message).to.equal("boom");
    expect(await next).to.equal("done");
  });
});
