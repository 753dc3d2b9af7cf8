import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { ShortTermMessage } from "@convomem/shared";
import { InvalidDeltaError, NoMessagesError, StorageUnavailableError } from "../../../src/errors.js";
import { FallbackCache } from "../../../src/services/FallbackCache.js";
import { GraphMemoryService } from "../../../src/services/GraphMemoryService.js";
import { buildSimulationDelta } from "../../../src/services/graphDelta.js";
import { FakeGraphStore } from "../../helpers/FakeGraphStore.js";
import { createDeferred, waitFor } from "../../helpers/async.js";

const start = Date.parse("2026-03-01T10:00:00.000Z");

describe("GraphMemoryService", () => {
  let clock: number;
  let store: FakeGraphStore;
  let cache: FallbackCache;
  let summarize: Mock<(messages: ShortTermMessage[], note?: string) => Promise<string>>;
  let memory: GraphMemoryService;

  const tick = (ms = 1): void => {
    clock += ms;
  };

  beforeEach(() => {
    clock = start;
    store = new FakeGraphStore();
    cache = new FallbackCache({ maxEntries: 100 });
    summarize = vi.fn(async (messages: ShortTermMessage[], _note?: string) => `summary of ${messages.length}`);
    memory = new GraphMemoryService(store, cache, { summarize }, {
      shortTermTtlMinutes: 60,
      probeIntervalMs: 1000,
      now: () => new Date(clock)
    });
  });

  it("writes messages through to the store while healthy", async () => {
    const message = await memory.recordMessage("s1", "user", "hello");

    expect(message.degraded).toBeUndefined();
    expect(message.sequence).toBe(start);
    expect(message.expiresAt.getTime() - message.createdAt.getTime()).toBe(60 * 60_000);
    expect(store.chain("s1")).toEqual([message.id]);
    expect(cache.size(new Date(clock))).toBe(0);
  });

  it("keeps accepting messages during an outage", async () => {
    store.reachable = false;

    const message = await memory.recordMessage("s1", "user", "still here");

    expect(message.degraded).toBe(true);
    expect(memory.connectionState).toBe("degraded");
    expect(cache.has(message.id)).toBe(true);
    const history = await memory.listMessages("s1");
    expect(history.map((entry) => entry.content)).toEqual(["still here"]);
  });

  it("keeps one total NEXT order across the store and fallback paths", async () => {
    const m1 = await memory.recordMessage("s1", "user", "one");
    tick();
    store.reachable = false;
    const m2 = await memory.recordMessage("s1", "assistant", "two");
    tick();
    const m3 = await memory.recordMessage("s1", "user", "three");

    store.reachable = true;
    tick(1000);
    const m4 = await memory.recordMessage("s1", "assistant", "four");

    expect(memory.connectionState).toBe("healthy");
    expect(m4.degraded).toBeUndefined();
    expect(store.chain("s1")).toEqual([m1.id, m2.id, m3.id, m4.id]);

    const snapshot = await memory.exportGraph({ sessionId: "s1" });
    const next = snapshot.edges
      .filter((edge) => edge.type === "NEXT")
      .map((edge) => [edge.source, edge.target]);
    expect(next).toEqual([
      [m1.id, m2.id],
      [m2.id, m3.id],
      [m3.id, m4.id]
    ]);
  });

  it("never interleaves concurrent writes to one session", async () => {
    const written = await Promise.all(
      Array.from({ length: 20 }, (_, index) => memory.recordMessage("s1", "user", `m${index}`))
    );

    const sequences = written.map((message) => message.sequence);
    expect(new Set(sequences).size).toBe(20);
    expect(store.chain("s1")).toHaveLength(20);
    expect(new Set(store.chain("s1"))).toEqual(new Set(written.map((message) => message.id)));

    const stored = store.chain("s1").map((id) => store.storedMessage(id)?.sequence ?? -1);
    expect(stored).toEqual([...stored].sort((a, b) => a - b));
    expect(stored[19]).toBe(start + 19);
  });

  it("consolidates exactly the live messages into one knowledge node", async () => {
    const ids: string[] = [];
    for (const content of ["m1", "m2", "m3"]) {
      ids.push((await memory.recordMessage("s1", "user", content)).id);
      tick();
    }

    const knowledge = await memory.consolidate("s1", "keep it short");

    expect(knowledge.summary).toBe("summary of 3");
    expect(knowledge.note).toBe("keep it short");
    expect(summarize).toHaveBeenCalledWith(
      expect.arrayContaining([expect.objectContaining({ content: "m1" })]),
      "keep it short"
    );

    const snapshot = await memory.exportGraph({ sessionId: "s1" });
    const knowledgeNodes = snapshot.nodes.filter((node) => node.label === "Knowledge");
    expect(knowledgeNodes.map((node) => node.id)).toEqual([knowledge.id]);

    const contributors = snapshot.edges
      .filter((edge) => edge.type === "CONTRIBUTED_TO" && edge.target === knowledge.id)
      .map((edge) => edge.source);
    expect(new Set(contributors)).toEqual(new Set(ids));
    expect(contributors).toHaveLength(3);
    expect(snapshot.edges).toContainEqual(
      expect.objectContaining({ type: "YIELDED", source: "s1", target: knowledge.id })
    );
  });

  it("refuses to consolidate a session without live messages", async () => {
    await memory.recordMessage("s1", "user", "old news");
    tick(61 * 60_000);

    await expect(memory.consolidate("s1")).rejects.toBeInstanceOf(NoMessagesError);
    await expect(memory.consolidate("empty")).rejects.toBeInstanceOf(NoMessagesError);
    expect(store.knowledgeEntries()).toEqual([]);
    expect(summarize).not.toHaveBeenCalled();
  });

  it("raises StorageUnavailableError when consolidating during an outage", async () => {
    store.reachable = false;
    await memory.recordMessage("s1", "user", "queued");

    await expect(memory.consolidate("s1")).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(cache.size(new Date(clock))).toBe(1);
  });

  it("consolidates cached messages once the store answers again", async () => {
    store.reachable = false;
    const cached = await memory.recordMessage("s1", "user", "offline note");
    store.reachable = true;

    const knowledge = await memory.consolidate("s1");

    expect(knowledge.sourceMessageIds).toEqual([cached.id]);
    expect(store.storedMessage(cached.id)?.degraded).toBeUndefined();
    expect(cache.size(new Date(clock))).toBe(0);
  });

  it("shows a message written during an outage exactly once after recovery", async () => {
    store.reachable = false;
    const message = await memory.recordMessage("s1", "user", "during outage");

    const degradedView = await memory.exportGraph();
    const cachedNode = degradedView.nodes.find((node) => node.id === message.id);
    expect(cachedNode?.properties.degraded).toBe(true);

    store.reachable = true;
    const health = await memory.health();
    expect(health).toEqual({
      state: "healthy",
      storeReachable: true,
      fallbackActive: false,
      fallbackSize: 0
    });

    const snapshot = await memory.exportGraph();
    const copies = snapshot.nodes.filter((node) => node.id === message.id);
    expect(copies).toHaveLength(1);
    expect(copies[0]?.properties.degraded).toBeUndefined();
    expect(snapshot).toEqual(await store.getSnapshot());
  });

  it("prefers the store copy when the cache holds the same id", async () => {
    const message = await memory.recordMessage("s1", "user", "stored copy");
    cache.append({ ...message, content: "cached copy" }, new Date(clock));

    const history = await memory.listMessages("s1");
    expect(history).toHaveLength(1);
    expect(history[0]?.content).toBe("stored copy");

    const snapshot = await memory.exportGraph({ sessionId: "s1" });
    const node = snapshot.nodes.find((entry) => entry.id === message.id);
    expect(node?.properties.content).toBe("stored copy");

    await memory.reconcile();
    expect(store.storedMessage(message.id)?.content).toBe("stored copy");
  });

  it("throttles store probes while degraded", async () => {
    store.reachable = false;
    await memory.recordMessage("s1", "user", "first");
    const probe = vi.spyOn(store, "probe");

    await memory.listMessages("s1");
    await memory.recordMessage("s1", "user", "second");
    expect(probe).not.toHaveBeenCalled();

    tick(1000);
    await memory.listMessages("s1");
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it("reports the fallback in health while the store is down", async () => {
    store.reachable = false;
    await memory.recordMessage("s1", "user", "a");
    await memory.recordMessage("s2", "user", "b");

    const health = await memory.health();

    expect(health.state).toBe("degraded");
    expect(health.storeReachable).toBe(false);
    expect(health.fallbackActive).toBe(true);
    expect(health.fallbackSize).toBe(2);
    expect(health.lastError).toBe("Graph store probe failed");
  });

  it("resets store and cache together", async () => {
    await memory.recordMessage("s1", "user", "stored");
    cache.append(
      {
        id: "orphan",
        sessionId: "s2",
        role: "user",
        content: "cached",
        sequence: 1,
        createdAt: new Date(clock),
        expiresAt: new Date(clock + 60_000)
      },
      new Date(clock)
    );

    await memory.reset();

    expect(await memory.exportGraph()).toEqual({ nodes: [], edges: [] });
    expect(cache.size(new Date(clock))).toBe(0);
  });

  it("clears nothing when the store is unreachable during reset", async () => {
    store.reachable = false;
    await memory.recordMessage("s1", "user", "kept");

    await expect(memory.reset()).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(cache.size(new Date(clock))).toBe(1);
  });

  it("forgets sequence positions the clock has already passed", async () => {
    const first = await memory.recordMessage("s1", "user", "one");
    const second = await memory.recordMessage("s1", "assistant", "two");
    await memory.recordMessage("s2", "user", "other");
    expect(memory.trackedSequenceCount).toBe(2);

    tick();
    const third = await memory.recordMessage("s1", "user", "three");
    tick(5);
    await memory.recordMessage("s3", "user", "later");

    expect([first, second, third].map((message) => message.sequence)).toEqual([
      start,
      start + 1,
      start + 2
    ]);
    expect(memory.trackedSequenceCount).toBe(1);
  });

  it("does not let an in-flight reconcile undo a reset", async () => {
    store.reachable = false;
    await memory.recordMessage("s1", "user", "cached during outage");
    store.reachable = true;

    const gate = createDeferred<void>();
    let appending = false;
    const append = store.appendMessages.bind(store);
    vi.spyOn(store, "appendMessages").mockImplementationOnce(async (messages) => {
      appending = true;
      await gate.promise;
      await append(messages);
    });

    const reconciling = memory.reconcile();
    await waitFor(() => appending);
    const resetting = memory.reset();
    gate.resolve();
    await resetting;
    await reconciling;

    expect(await memory.exportGraph()).toEqual({ nodes: [], edges: [] });
    expect(cache.size(new Date(clock))).toBe(0);
    expect(memory.connectionState).toBe("healthy");
  });

  it("applies a simulation delta into the target session", async () => {
    const existing = await memory.recordMessage("target", "user", "before");
    tick();
    const delta = buildSimulationDelta({
      jobId: "job-1",
      createdAt: new Date(clock),
      ttlMs: 60_000,
      summary: "agreed on a plan",
      transcript: [
        { speaker: "Planner", content: "Let us plan.", timestamp: new Date(clock) },
        { speaker: "Critic", content: "Fine.", timestamp: new Date(clock) }
      ]
    });

    const applied = await memory.applyDelta(delta, "target");

    expect(applied.sessionId).toBe("target");
    expect(applied.messages.map((message) => message.role)).toEqual(["Planner", "Critic"]);
    expect(applied.knowledge.summary).toBe("agreed on a plan");
    expect(applied.knowledge.sourceMessageIds).toEqual(applied.messages.map((message) => message.id));
    expect(store.chain("target")).toEqual([existing.id, ...applied.messages.map((message) => message.id)]);
  });

  it("rejects a delta without a knowledge node", async () => {
    const delta = buildSimulationDelta({
      jobId: "job-2",
      createdAt: new Date(clock),
      ttlMs: 60_000,
      transcript: [{ speaker: "Planner", content: "Hi", timestamp: new Date(clock) }]
    });

    await expect(memory.applyDelta(delta, "target")).rejects.toBeInstanceOf(InvalidDeltaError);
  });

  it("fails a delta commit while the store is down", async () => {
    store.reachable = false;
    const delta = buildSimulationDelta({
      jobId: "job-3",
      createdAt: new Date(clock),
      ttlMs: 60_000,
      summary: "s",
      transcript: [{ speaker: "Planner", content: "Hi", timestamp: new Date(clock) }]
    });

    await expect(memory.applyDelta(delta, "target")).rejects.toBeInstanceOf(StorageUnavailableError);
  });
});
