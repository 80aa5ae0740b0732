import type { CandidateAsset } from "@tradeloop/core";
import { describe, expect, it, vi } from "vitest";
import type { Notifier } from "../notifier.js";
import { createTestCaller, createTestLogger } from "../test-support.js";
import { SignalPoller } from "./poller.js";
import type { SignalSource } from "./source.js";

function asset(symbol: string): CandidateAsset {
  return { symbol, address: `addr${symbol}`, source: "fake" };
}

function createSource() {
  return {
    name: "fake",
    initialize: vi.fn<SignalSource["initialize"]>(async () => undefined),
    teardown: vi.fn<SignalSource["teardown"]>(async () => undefined),
    extractCandidates: vi.fn<SignalSource["extractCandidates"]>(async () => []),
  } satisfies SignalSource;
}

function createPoller(source: SignalSource, intervalSeconds = 60) {
  const log = createTestLogger();
  const publish = vi.fn<(candidate: CandidateAsset) => boolean>(() => true);
  const notify = vi.fn<Notifier["notify"]>(async () => undefined);
  const poller = new SignalPoller({
    source,
    caller: createTestCaller(log.logger),
    intervalSeconds,
    publish,
    logger: log.logger,
    notifier: { notify },
  });
  return { poller, publish, notify, log };
}

describe("SignalPoller", () => {
  it("announces every candidate on the first pass and only newcomers after that", async () => {
    const source = createSource();
    source.extractCandidates
      .mockResolvedValueOnce([asset("FOO"), asset("BAR")])
      .mockResolvedValueOnce([asset("FOO"), asset("BAR"), asset("BAZ")]);
    const { poller, publish } = createPoller(source);

    expect((await poller.poll()).map((candidate) => candidate.symbol)).toEqual(["FOO", "BAR"]);
    expect((await poller.poll()).map((candidate) => candidate.symbol)).toEqual(["BAZ"]);
    expect(publish.mock.calls.map(([candidate]) => candidate.symbol)).toEqual(["FOO", "BAR", "BAZ"]);
  });

  it("alerts the operator about each newly detected candidate", async () => {
    const source = createSource();
    source.extractCandidates
      .mockResolvedValueOnce([{ ...asset("FOO"), price: 0.002 }])
      .mockResolvedValueOnce([asset("FOO")]);
    const { poller, notify } = createPoller(source);

    await poller.poll();
    await poller.poll();

    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith({
      kind: "CANDIDATE_DETECTED",
      symbol: "FOO",
      message: "New candidate FOO from fake",
      data: { address: "addrFOO", source: "fake", price: 0.002 },
    });
  });

  it("keeps publishing when the candidate alert fails", async () => {
    const source = createSource();
    source.extractCandidates.mockResolvedValueOnce([asset("FOO")]);
    const { poller, publish, notify, log } = createPoller(source);
    notify.mockRejectedValue(new Error("webhook down"));

    await poller.poll();

    expect(publish).toHaveBeenCalledTimes(1);
    await vi.waitFor(() => {
      expect(log.codes()).toContain("NOTIFY_FAIL");
    });
  });

  it("re-announces a symbol that dropped out and came back", async () => {
    const source = createSource();
    source.extractCandidates
      .mockResolvedValueOnce([asset("FOO")])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([asset("FOO")]);
    const { poller } = createPoller(source);

    await poller.poll();
    await poller.poll();

    expect(await poller.poll()).toEqual([asset("FOO")]);
  });

  it("reports a symbol once per pass even when listed twice", async () => {
    const source = createSource();
    source.extractCandidates.mockResolvedValueOnce([asset("FOO"), { ...asset("FOO"), address: "other" }]);
    const { poller } = createPoller(source);

    expect(await poller.poll()).toEqual([asset("FOO")]);
  });

  it("keeps polling after a failed pass and tears down on stop", async () => {
    const source = createSource();
    source.extractCandidates.mockRejectedValueOnce(new Error("listing broke")).mockResolvedValue([asset("FOO")]);
    const { poller, publish, log } = createPoller(source, 0.01);

    const running = poller.start();
    await vi.waitFor(() => {
      expect(publish).toHaveBeenCalledWith(asset("FOO"));
    });
    await poller.stop();
    await running;

    expect(log.codes()).toContain("SIGNAL_POLL_FAIL");
    expect(source.initialize).toHaveBeenCalledTimes(1);
    expect(source.teardown).toHaveBeenCalledTimes(1);
    expect(poller.isRunning()).toBe(false);
  });

  it("wakes from the interval sleep when stopped", async () => {
    const source = createSource();
    const { poller } = createPoller(source, 3_600);

    const running = poller.start();
    await vi.waitFor(() => {
      expect(source.extractCandidates).toHaveBeenCalledTimes(1);
    });
    await poller.stop();
    await running;

    expect(source.teardown).toHaveBeenCalledTimes(1);
  });

  it("does not poll a source that failed to initialize", async () => {
    const source = createSource();
    source.initialize.mockRejectedValueOnce(new Error("no session"));
    const { poller, log } = createPoller(source);

    await poller.start();

    expect(source.extractCandidates).not.toHaveBeenCalled();
    expect(source.teardown).toHaveBeenCalledTimes(1);
    expect(log.codes()).toContain("SIGNAL_INIT_FAIL");
  });
});
