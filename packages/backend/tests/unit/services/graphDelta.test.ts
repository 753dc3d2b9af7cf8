import { describe, expect, it } from "vitest";
import { InvalidDeltaError } from "../../../src/errors.js";
import {
  buildSimulationDelta,
  readDeltaConversation,
  simulationSessionId
} from "../../../src/services/graphDelta.js";

const createdAt = new Date("2026-03-01T10:00:00.000Z");
const transcript = [
  { speaker: "Planner", content: "Opening.", timestamp: new Date("2026-03-01T10:00:01.000Z") },
  { speaker: "Critic", content: "Objection.", timestamp: new Date("2026-03-01T10:00:02.000Z") },
  { speaker: "Planner", content: "Resolution.", timestamp: new Date("2026-03-01T10:00:03.000Z") }
];

describe("graphDelta", () => {
  it("builds a chained session without knowledge while the dialogue runs", () => {
    const delta = buildSimulationDelta({ jobId: "job-1", createdAt, transcript, ttlMs: 60_000 });
    const sessionId = simulationSessionId("job-1");

    expect(sessionId).toBe("simulation-job-1");
    expect(delta.nodes.map((node) => node.label)).toEqual([
      "ChatSession",
      "ShortTermMessage",
      "ShortTermMessage",
      "ShortTermMessage"
    ]);
    expect(delta.nodes[1]?.properties).toMatchObject({
      role: "Planner",
      content: "Opening.",
      sequence: 0,
      createdAt: "2026-03-01T10:00:01.000Z"
    });
    expect(
      delta.edges.filter((edge) => edge.type === "NEXT").map((edge) => edge.id)
    ).toEqual([
      "NEXT:simulation-job-1-message-0:simulation-job-1-message-1",
      "NEXT:simulation-job-1-message-1:simulation-job-1-message-2"
    ]);
    expect(delta.edges.filter((edge) => edge.type === "HAS_MESSAGE")).toHaveLength(3);
  });

  it("adds one knowledge node linked from every message once summarized", () => {
    const delta = buildSimulationDelta({
      jobId: "job-1",
      createdAt,
      transcript,
      ttlMs: 60_000,
      summary: "They reached a resolution."
    });

    const knowledge = delta.nodes.filter((node) => node.label === "Knowledge");
    expect(knowledge.map((node) => node.id)).toEqual(["simulation-job-1-knowledge"]);
    expect(delta.edges.filter((edge) => edge.type === "CONTRIBUTED_TO")).toHaveLength(3);
    expect(delta.edges).toContainEqual(
      expect.objectContaining({
        type: "YIELDED",
        source: "simulation-job-1",
        target: "simulation-job-1-knowledge"
      })
    );
  });

  it("reads the conversation back in sequence order", () => {
    const delta = buildSimulationDelta({
      jobId: "job-1",
      createdAt,
      transcript,
      ttlMs: 60_000,
      summary: "They reached a resolution."
    });
    delta.nodes.reverse();

    expect(readDeltaConversation(delta)).toEqual({
      summary: "They reached a resolution.",
      messages: [
        { role: "Planner", content: "Opening.", sequence: 0 },
        { role: "Critic", content: "Objection.", sequence: 1 },
        { role: "Planner", content: "Resolution.", sequence: 2 }
      ]
    });
  });

  it("rejects malformed deltas", () => {
    expect(() => readDeltaConversation({ nodes: [], edges: [] })).toThrow(InvalidDeltaError);
    expect(() =>
      readDeltaConversation({
        nodes: [{ id: "m", label: "ShortTermMessage", properties: { role: "Planner" } }],
        edges: []
      })
    ).toThrow("Malformed graph delta: message node m is missing role, content or sequence");
  });
});
