import { beforeEach, describe, expect, it, vi } from "vitest";
import type { KeyEvent } from "./globalKeySource";
import { GlobalKeySource } from "./globalKeySource";

type RawListener = (event: { name?: string; state: "DOWN" | "UP" }) => void;

const gkl = vi.hoisted(() => {
  const instances: Array<{
    listeners: RawListener[];
    addListener: (listener: RawListener) => Promise<void>;
    removeListener: (listener: RawListener) => void;
    kill: () => void;
    killed: boolean;
  }> = [];
  return { instances, failNextStart: false };
});

vi.mock("node-global-key-listener", () => ({
  GlobalKeyboardListener: class {
    listeners: RawListener[] = [];
    killed = false;

    constructor() {
      gkl.instances.push(this);
    }

    async addListener(listener: RawListener): Promise<void> {
      if (gkl.failNextStart) {
        gkl.failNextStart = false;
        throw new Error("key server exited");
      }
      this.listeners.push(listener);
    }

    removeListener(listener: RawListener): void {
      this.listeners = this.listeners.filter((l) => l !== listener);
    }

    kill(): void {
      this.killed = true;
    }
  }
}));

describe("GlobalKeySource", () => {
  beforeEach(() => {
    gkl.instances.length = 0;
  });

  it("forwards key name and direction", async () => {
    const events: KeyEvent[] = [];
    const source = new GlobalKeySource();

    await source.start((event) => events.push(event));
    gkl.instances[0].listeners[0]({ name: "RIGHT CTRL", state: "DOWN" });
    gkl.instances[0].listeners[0]({ name: "RIGHT CTRL", state: "UP" });

    expect(events).toEqual([
      { name: "RIGHT CTRL", state: "DOWN" },
      { name: "RIGHT CTRL", state: "UP" }
    ]);
  });

  it("detaches and kills the key server on stop", async () => {
    const source = new GlobalKeySource();

    await source.start(() => undefined);
    source.stop();

    expect(gkl.instances[0].listeners).toEqual([]);
    expect(gkl.instances[0].killed).toBe(true);
  });

  it("cleans up when the key server cannot start", async () => {
    gkl.failNextStart = true;
    const source = new GlobalKeySource();

    await expect(source.start(() => undefined)).rejects.toThrow("key server exited");
    expect(gkl.instances[0].killed).toBe(true);

    await source.start(() => undefined);
    expect(gkl.instances).toHaveLength(2);
  });
});
