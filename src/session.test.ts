import { beforeEach, describe, expect, it } from "vitest";
import { OutlineEngine } from "./engine.js";
import { SessionClosedError } from "./errors.js";
import { OutlineSession } from "./session.js";

function counterIds(): () => string {
  let n = 0;
  return () => `n${++n}`;
}

describe("OutlineSession", () => {
  let session: OutlineSession;

  beforeEach(() => {
    session = new OutlineSession(new OutlineEngine({ createId: counterIds(), logLevel: "silent" }));
  });

  it("should run batches one after another in submission order", async () => {
    const order: string[] = [];
    const first = session.submit((e) => {
      order.push("first");
      e.setText(e.createNode(null), "@= 1");
    });
    const second = session.submit((e) => {
      order.push("second");
      e.setText(e.createNode(null), '@= node("n1").value + 1');
    });

    expect((await first).evaluated).toEqual(["n1"]);
    expect((await second).evaluated).toEqual(["n2"]);
    expect(order).toEqual(["first", "second"]);
    expect(session.engine.getNode("n2").value).toBe(2);
  });

  it("should surface a failing batch without blocking the queue", async () => {
    const failing = session.submit((e) => {
      e.deleteNode("missing");
    });
    const next = session.submit((e) => {
      e.createNode(null);
    });
    await expect(failing).rejects.toThrow("Node not found: missing");
    await expect(next).resolves.toMatchObject({ cancelled: false });
  });

  it("should evaluate the writes of a batch that throws part way", async () => {
    const failing = session.submit((e) => {
      const a = e.createNode(null);
      e.setText(a, "@= 6 * 7");
      e.setText("missing", "x");
    });
    await expect(failing).rejects.toThrow("Node not found: missing");
    expect(session.engine.getNode("n1")).toMatchObject({ state: "clean", value: 42 });
  });

  it("should reject batches still queued when closed", async () => {
    const queued = session.submit((e) => {
      e.createNode(null);
    });
    session.close();
    await expect(queued).rejects.toBeInstanceOf(SessionClosedError);
    await expect(session.submit(() => undefined)).rejects.toBeInstanceOf(SessionClosedError);
    expect(session.engine.size).toBe(0);
  });

  it("should cancel the running pass when closed from inside a batch", async () => {
    const report = await session.submit((e) => {
      e.setText(e.createNode(null), "@= 1");
      session.close();
    });
    expect(report.cancelled).toBe(true);
    expect(session.engine.dirtyNodes()).toEqual(["n1"]);
    expect(session.isClosed).toBe(true);
  });

  it("should settle whenIdle after queued work", async () => {
    void session.submit((e) => {
      e.createNode(null);
    });
    await session.whenIdle();
    expect(session.engine.size).toBe(1);
  });
});
