import { z } from "zod";
import type {
  GraphDelta,
  GraphEdge,
  GraphNode,
  ShortTermMessage
} from "@convomem/shared";
import { InvalidDeltaError } from "../errors.js";
import { chainEdges, createEdge, messageNode, sessionNode } from "./graphView.js";

export interface DeltaTranscriptEntry {
  speaker: string;
  content: string;
  timestamp: Date;
}

export interface DeltaConversation {
  messages: Array<{ role: string; content: string; sequence: number }>;
  summary: string;
}

const messagePropertiesSchema = z.object({
  role: z.string().min(1),
  content: z.string(),
  sequence: z.number().int().min(0)
});

const knowledgePropertiesSchema = z.object({
  summary: z.string().min(1)
});

export function simulationSessionId(jobId: string): string {
  return `simulation-${jobId}`;
}

/** The simulated turns as short-term messages of the job's own session. */
export function transcriptMessages(
  jobId: string,
  transcript: DeltaTranscriptEntry[],
  ttlMs: number
): ShortTermMessage[] {
  const sessionId = simulationSessionId(jobId);
  return transcript.map((entry, index) => ({
    id: `${sessionId}-message-${index}`,
    sessionId,
    role: entry.speaker,
    content: entry.content,
    sequence: index,
    createdAt: entry.timestamp,
    expiresAt: new Date(entry.timestamp.getTime() + ttlMs)
  }));
}

/**
 * Builds the not-yet-persisted graph for a simulated transcript. The
 * knowledge node is only present once the dialogue has a summary.
 */
export function buildSimulationDelta(input: {
  jobId: string;
  createdAt: Date;
  transcript: DeltaTranscriptEntry[];
  ttlMs: number;
  summary?: string;
}): GraphDelta {
  const sessionId = simulationSessionId(input.jobId);
  const messages = transcriptMessages(input.jobId, input.transcript, input.ttlMs);

  const nodes: GraphNode[] = [sessionNode(sessionId, input.createdAt), ...messages.map(messageNode)];
  const edges: GraphEdge[] = chainEdges(sessionId, messages);

  if (input.summary !== undefined && messages.length > 0) {
    const knowledgeId = `${sessionId}-knowledge`;
    nodes.push({
      id: knowledgeId,
      label: "Knowledge",
      properties: {
        id: knowledgeId,
        sessionId,
        summary: input.summary,
        createdAt: input.createdAt.toISOString()
      }
    });
    edges.push(createEdge("YIELDED", sessionId, knowledgeId));
    for (const message of messages) {
      edges.push(createEdge("CONTRIBUTED_TO", message.id, knowledgeId));
    }
  }

  return { nodes, edges };
}

/** Reads the dialogue and its summary back out of a proposed delta. */
export function readDeltaConversation(delta: GraphDelta): DeltaConversation {
  const messages: DeltaConversation["messages"] = [];
  const summaries: string[] = [];

  for (const node of delta.nodes) {
    if (node.label === "ShortTermMessage") {
      const parsed = messagePropertiesSchema.safeParse(node.properties);
      if (!parsed.success) {
        throw new InvalidDeltaError(`message node ${node.id} is missing role, content or sequence`);
      }
      messages.push(parsed.data);
    } else if (node.label === "Knowledge") {
      const parsed = knowledgePropertiesSchema.safeParse(node.properties);
      if (!parsed.success) {
        throw new InvalidDeltaError(`knowledge node ${node.id} has no summary`);
      }
      summaries.push(parsed.data.summary);
    }
  }

  const summary = summaries[0];
  if (messages.length === 0) {
    throw new InvalidDeltaError("no message nodes");
  }
  if (summary === undefined || summaries.length > 1) {
    throw new InvalidDeltaError("expected exactly one knowledge node");
  }

  messages.sort((a, b) => a.sequence - b.sequence);
  return { messages, summary };
}
