import type { GraphDelta } from "./graph.js";

export type SimulationJobStatus = "queued" | "running" | "completed" | "failed" | "cancelled";

export interface SimulationParticipant {
  role: string;
  persona?: string;
}

export interface SimulationRequest {
  participants: SimulationParticipant[];
  turnLimit: number;
  seedContext?: string;
}

export interface SimulationProgressRecord {
  turnIndex: number;
  speaker: string;
  content: string;
  timestamp: Date;
  delta?: GraphDelta;
}

export interface SimulationCommitResult {
  jobId: string;
  sessionId: string;
  knowledgeId: string;
  messageIds: string[];
  nodeCount: number;
  edgeCount: number;
  committedAt: Date;
}

export interface SimulationJob {
  id: string;
  status: SimulationJobStatus;
  participants: SimulationParticipant[];
  turnLimit: number;
  seedContext?: string;
  progress: SimulationProgressRecord[];
  latestDelta: GraphDelta | null;
  proposedDelta: GraphDelta | null;
  summary: string | null;
  error: string | null;
  committed: boolean;
  commit?: SimulationCommitResult;
  createdAt: Date;
  updatedAt: Date;
}

export interface SimulationJobSummary {
  id: string;
  status: SimulationJobStatus;
  turnLimit: number;
  progressCount: number;
  committed: boolean;
  createdAt: Date;
  updatedAt: Date;
}
