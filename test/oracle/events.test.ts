import { expect } from "chai";

import { setLogEnabled } from "../../utils/log";
import { TypedEvents } from "../../utils/oracle/events";

type TestEvents = {
  Ping: { n: number };
  Pong: string;
};

describe("TypedEvents", () => {
  let events: TypedEvents<TestEvents>;

  beforeEach(() => {
    setLogEnabled(false);
    events = new TypedEvents<TestEvents>("test");
  });

  it("should deliver the payload to every listener of the event", () => {
    const seen: number[] = [];
    events.on("Ping", ({ n }) => seen.push(n));
    events.on("Ping", ({ n }) => seen.push(n * 10));
    events.on("Pong", () => seen.push(-1));

    events.emit("Ping", { n: 2 });

    expect(seen).to.deep.equal([2, 20]);
  });

  it("should keep calling listeners after one throws, without throwing itself", () => {
    const seen: string[] = [];
    events.on("Pong", () => {
      throw new Error("listener failed");
    });
    events.on("Pong", (payload) => seen.push(payload));

    expect(() => events.emit("Pong", "hello")).to.not.throw();
    expect(seen).to.deep.equal(["hello"]);
  });

  it("should stop calling a listener after off()", () => {
    const seen: number[] = [];
    const listener = ({ n }: { n: number }): void => {
      seen.push(n);
    };

    events.on("Ping", listener);
    events.emit("Ping", { n: 1 });
    events.off("Ping", listener);
    events.emit("Ping", { n: 2 });

    expect(seen).to.deep.equal([1]);
  });
});
