import type {
  GraphEdge,
  GraphNode,
  GraphSnapshot,
  MemoryRelationType,
  ShortTermMessage
} from "@convomem/shared";

export function edgeId(type: MemoryRelationType, source: string, target: string): string {
  return `${type}:${source}:${target}`;
}

export function createEdge(
  type: MemoryRelationType,
  source: string,
  target: string,
  properties: Record<string, unknown> = {}
): GraphEdge {
  return { id: edgeId(type, source, target), type, source, target, properties };
}

export function sessionNode(sessionId: string, createdAt: Date): GraphNode {
  return {
    id: sessionId,
    label: "ChatSession",
    properties: { id: sessionId, createdAt: createdAt.toISOString() }
  };
}

export function messageNode(message: ShortTermMessage): GraphNode {
  const properties: Record<string, unknown> = {
    id: message.id,
    sessionId: message.sessionId,
    role: message.role,
    content: message.content,
    sequence: message.sequence,
    createdAt: message.createdAt.toISOString(),
    expiresAt: message.expiresAt.toISOString()
  };
  if (message.degraded) {
    properties.degraded = true;
  }
  return { id: message.id, label: "ShortTermMessage", properties };
}

/** HAS_MESSAGE and NEXT edges for one session's messages, already in chain order. */
export function chainEdges(sessionId: string, ordered: ShortTermMessage[]): GraphEdge[] {
  const edges: GraphEdge[] = [];
  let previous: ShortTermMessage | undefined;
  for (const message of ordered) {
    edges.push(createEdge("HAS_MESSAGE", sessionId, message.id));
    if (previous) {
      edges.push(createEdge("NEXT", previous.id, message.id));
    }
    previous = message;
  }
  return edges;
}

export function readSequence(node: GraphNode): number {
  const value = node.properties.sequence;
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Overlays fallback-cache messages on a store snapshot. Store nodes win on id
 * conflicts; the NEXT chain of every session touched by the cache is rebuilt
 * over the merged message order so it stays total.
 */
export function mergeCachedMessages(
  snapshot: GraphSnapshot,
  cached: ShortTermMessage[]
): GraphSnapshot {
  const nodes = new Map<string, GraphNode>();
  for (const node of snapshot.nodes) {
    nodes.set(node.id, node);
  }

  const pending = cached.filter((message) => !nodes.has(message.id));
  if (pending.length === 0) {
    return { nodes: [...nodes.values()], edges: dedupeEdges(snapshot.edges) };
  }

  const touchedSessions = new Set(pending.map((message) => message.sessionId));
  for (const message of pending) {
    if (!nodes.has(message.sessionId)) {
      nodes.set(message.sessionId, sessionNode(message.sessionId, message.createdAt));
    }
    nodes.set(message.id, messageNode(message));
  }

  const edges = snapshot.edges.filter((edge) => {
    if (edge.type !== "NEXT" && edge.type !== "HAS_MESSAGE") {
      return true;
    }
    const target = nodes.get(edge.target);
    const owner = target?.properties.sessionId;
    return !(typeof owner === "string" && touchedSessions.has(owner));
  });

  for (const sessionId of touchedSessions) {
    const ordered = [...nodes.values()]
      .filter(
        (node) => node.label === "ShortTermMessage" && node.properties.sessionId === sessionId
      )
      .sort((a, b) => readSequence(a) - readSequence(b));
    edges.push(...chainNodeEdges(sessionId, ordered));
  }

  return { nodes: [...nodes.values()], edges: dedupeEdges(edges) };
}

function chainNodeEdges(sessionId: string, ordered: GraphNode[]): GraphEdge[] {
  const edges: GraphEdge[] = [];
  let previous: GraphNode | undefined;
  for (const node of ordered) {
    edges.push(createEdge("HAS_MESSAGE", sessionId, node.id));
    if (previous) {
      edges.push(createEdge("NEXT", previous.id, node.id));
    }
    previous = node;
  }
  return edges;
}

export function dedupeEdges(edges: GraphEdge[]): GraphEdge[] {
  const byId = new Map<string, GraphEdge>();
  for (const edge of edges) {
    if (!byId.has(edge.id)) {
      byId.set(edge.id, edge);
    }
  }
  return [...byId.values()];
}
