import { describe, it, expect, vi, beforeEach } from "vitest";
import * as core from "@actions/core";
import { runCycle, type CycleDeps } from "../src/pipeline.js";
import { WatchConfigSchema } from "../src/config.js";
import { DeliveryError, FetchError } from "../src/errors.js";
import { MemoryStateStore } from "../src/tracker/store.js";
import type { KernelInfo } from "../src/sources/types.js";
import type { BestState } from "../src/tracker/state.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
}));

const config = WatchConfigSchema.parse({ competition: "titanic" });
const fixedNow = () => new Date("2026-03-01T12:00:00.000Z");

const kernels: KernelInfo[] = [
  { identifier: "bob/eda", title: "EDA and ideas" },
  {
    identifier: "alice/better-try",
    title: "Better try LB 0.81",
    url: "https://www.kaggle.com/code/alice/better-try",
  },
];

const stored: BestState = { score: 0.77, kernelIdentifier: "alice/my-solution" };

function makeDeps(overrides: Partial<CycleDeps> = {}) {
  const store = new MemoryStateStore(stored);
  const deps = {
    fetchKernels: vi.fn(async () => kernels),
    notify: vi.fn(async () => {}),
    store,
    now: fixedNow,
    ...overrides,
  };
  return deps;
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("runCycle", () => {
  it("notifies and commits a new best score", async () => {
    const deps = makeDeps();

    const result = await runCycle(stored, config, deps, false);

    expect(result.outcome).toBe("improved");
    expect(result.notified).toBe(true);
    expect(result.candidate?.identifier).toBe("alice/better-try");
    expect(result.state).toEqual({
      score: 0.81,
      kernelIdentifier: "alice/better-try",
      title: "Better try LB 0.81",
      updatedAt: "2026-03-01T12:00:00.000Z",
    });
    expect(deps.notify).toHaveBeenCalledWith(
      "New best kernel published!\nTitle: Better try LB 0.81\nScore: 0.81\nPrevious best: 0.77\nURL: https://www.kaggle.com/code/alice/better-try",
      config
    );
    expect(deps.store.load()).toBe(result.state);
  });

  it("passes the competition to the fetcher", async () => {
    const deps = makeDeps();
    await runCycle(stored, config, deps, false);
    expect(deps.fetchKernels).toHaveBeenCalledWith("titanic", config);
  });

  it("saves the state only after the send attempt", async () => {
    const callOrder: string[] = [];
    const store = new MemoryStateStore(stored);
    const deps = makeDeps({
      notify: vi.fn(async () => {
        callOrder.push("notify");
      }),
      store: {
        load: () => store.load(),
        save: (state) => {
          callOrder.push("save");
          store.save(state);
        },
      },
    });

    await runCycle(stored, config, deps, false);

    expect(callOrder).toEqual(["notify", "save"]);
  });

  it("keeps the state when the fetch fails", async () => {
    const deps = makeDeps({
      fetchKernels: vi.fn(async () => {
        throw new FetchError("Kernel listing returned HTTP 503", "titanic", 503);
      }),
    });

    const result = await runCycle(stored, config, deps, false);

    expect(result).toEqual({ state: stored, outcome: "fetch_failed", notified: false });
    expect(result.state).toBe(stored);
    expect(deps.notify).not.toHaveBeenCalled();
    expect(core.warning).toHaveBeenCalledWith(
      "Fetching kernels failed: FETCH_FAILED: Kernel listing returned HTTP 503"
    );
  });

  it("reports cycles where no title carries a score", async () => {
    const deps = makeDeps({
      fetchKernels: vi.fn(async () => [kernels[0]]),
    });

    const result = await runCycle(stored, config, deps, false);

    expect(result.outcome).toBe("no_score");
    expect(result.state).toBe(stored);
    expect(deps.notify).not.toHaveBeenCalled();
  });

  it("does not notify for an equal score", async () => {
    const deps = makeDeps();
    const current: BestState = { score: 0.81, kernelIdentifier: "carol/other" };

    const result = await runCycle(current, config, deps, false);

    expect(result.outcome).toBe("unchanged");
    expect(result.state).toBe(current);
    expect(deps.notify).not.toHaveBeenCalled();
  });

  it("commits the new best even when delivery fails", async () => {
    const deps = makeDeps({
      notify: vi.fn(async () => {
        throw new DeliveryError("Telegram rejected the message: HTTP 502", 502);
      }),
    });

    const result = await runCycle(stored, config, deps, false);

    expect(result.outcome).toBe("improved");
    expect(result.notified).toBe(false);
    expect(result.state.score).toBe(0.81);
    expect(deps.store.load().score).toBe(0.81);
    expect(core.warning).toHaveBeenCalledWith(
      "Notification failed: DELIVERY_FAILED: Telegram rejected the message: HTTP 502"
    );
  });

  it("logs instead of sending in dry run mode", async () => {
    const deps = makeDeps();

    const result = await runCycle(stored, config, deps, true);

    expect(deps.notify).not.toHaveBeenCalled();
    expect(result.outcome).toBe("improved");
    expect(result.notified).toBe(false);
    expect(result.state.score).toBe(0.81);
  });

  it("reports the phases it goes through", async () => {
    const phases: string[] = [];
    const deps = makeDeps({ onPhase: (phase) => phases.push(phase) });

    await runCycle(stored, config, deps, false);

    expect(phases).toEqual(["fetching", "evaluating", "notifying"]);
  });

  it("uses the configured sort direction", async () => {
    const minimize = WatchConfigSchema.parse({
      competition: "titanic",
      sort_direction: "minimize",
    });
    const deps = makeDeps();

    const result = await runCycle(stored, minimize, deps, false);

    expect(result.outcome).toBe("unchanged");
  });

  it("returns the new best even when saving it fails", async () => {
    const deps = makeDeps({
      store: {
        load: () => stored,
        save: () => {
          throw new Error("disk full");
        },
      },
    });

    const result = await runCycle(stored, config, deps, false);

    expect(result.outcome).toBe("improved");
    expect(result.notified).toBe(true);
    expect(result.state.score).toBe(0.81);
    expect(core.warning).toHaveBeenCalledWith(
      "Saving the best score failed: disk full"
    );
  });

  it("treats an exception while evaluating as a failed cycle", async () => {
    const deps = makeDeps({
      now: () => {
        throw new Error("clock unavailable");
      },
    });

    const result = await runCycle(stored, config, deps, false);

    expect(result).toEqual({ state: stored, outcome: "error", notified: false });
    expect(result.state).toBe(stored);
    expect(deps.notify).not.toHaveBeenCalled();
    expect(deps.store.load()).toBe(stored);
    expect(core.warning).toHaveBeenCalledWith(
      "Ranking kernels failed: clock unavailable"
    );
  });
});
