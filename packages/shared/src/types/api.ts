import type { GraphSnapshot } from "./graph.js";
import type { Knowledge, MemoryHealth, ShortTermMessage } from "./memory.js";
import type {
  SimulationCommitResult,
  SimulationJob,
  SimulationJobStatus,
  SimulationJobSummary,
  SimulationParticipant
} from "./simulation.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface ChatRequest {
  session: string;
  content: string;
  role?: "user" | "system";
}

export interface ChatResponse {
  sessionId: string;
  message: ShortTermMessage;
  reply: ShortTermMessage;
  degraded: boolean;
  history: ShortTermMessage[];
}

export interface MemoryHistoryResponse {
  sessionId: string;
  messages: ShortTermMessage[];
}

export interface ConsolidateRequest {
  session: string;
  note?: string;
}

export interface ConsolidateResponse {
  knowledge: Knowledge;
}

export type GraphExportResponse = GraphSnapshot;

export interface GraphResetResponse {
  status: "graph cleared";
}

export interface SimulationRunRequest {
  participants: SimulationParticipant[];
  turnLimit: number;
  seedContext?: string;
}

export interface SimulationRunResponse {
  jobId: string;
  status: SimulationJobStatus;
}

export interface SimulationJobResponse {
  job: SimulationJob;
}

export interface SimulationJobListResponse {
  jobs: SimulationJobSummary[];
}

export interface SimulationCommitRequest {
  jobId: string;
  sessionId?: string;
}

export interface SimulationCommitResponse {
  commit: SimulationCommitResult;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  checks: {
    neo4j: ServiceConnectionStatus;
    llm: ServiceConnectionStatus;
  };
  memory: MemoryHealth;
}
