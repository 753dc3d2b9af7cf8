export type MemoryNodeLabel = "ChatSession" | "ShortTermMessage" | "Knowledge";

export type MemoryRelationType = "HAS_MESSAGE" | "NEXT" | "YIELDED" | "CONTRIBUTED_TO";

export interface GraphNode {
  id: string;
  label: MemoryNodeLabel;
  properties: Record<string, unknown>;
}

export interface GraphEdge {
  id: string;
  type: MemoryRelationType;
  source: string;
  target: string;
  properties: Record<string, unknown>;
}

export interface GraphSnapshot {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/**
 * Proposed nodes and relationships that have not been written to the store.
 * Shaped exactly like an exported snapshot.
 */
export type GraphDelta = GraphSnapshot;

export interface GraphFilter {
  sessionId?: string;
}
