export type ChatRole = "user" | "assistant" | "system";

/** Agent names used by simulations are recorded verbatim as roles. */
export type MessageRole = ChatRole | (string & {});

export interface ChatSession {
  id: string;
  createdAt: Date;
}

export interface ShortTermMessage {
  id: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  sequence: number;
  createdAt: Date;
  expiresAt: Date;
  /** Set when the message was accepted by the fallback cache instead of the graph store. */
  degraded?: boolean;
}

export interface Knowledge {
  id: string;
  sessionId: string;
  summary: string;
  note?: string;
  createdAt: Date;
  sourceMessageIds: string[];
}

export type ConnectionState = "healthy" | "degraded";

export interface MemoryHealth {
  state: ConnectionState;
  storeReachable: boolean;
  fallbackActive: boolean;
  fallbackSize: number;
  lastError?: string;
}
