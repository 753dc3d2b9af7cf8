import type { GraphFilter, GraphSnapshot } from "./types/graph.js";
import type { Knowledge, ShortTermMessage } from "./types/memory.js";

export type QueryParams = Record<string, unknown>;

export type QueryRecord = Record<string, unknown>;

export interface CypherStore {
  read(query: string, params?: QueryParams): Promise<QueryRecord[]>;
  write(query: string, params?: QueryParams): Promise<QueryRecord[]>;
  probe(): Promise<boolean>;
}

export interface ConsolidationWrite {
  /** Messages that must be persisted in the same transaction, before the knowledge node. */
  messages: ShortTermMessage[];
  knowledge: Knowledge;
}

export interface MessageStore {
  appendMessages(messages: ShortTermMessage[]): Promise<void>;
  listLiveMessages(sessionId: string, now: Date): Promise<ShortTermMessage[]>;
}

export interface KnowledgeStore {
  writeConsolidation(input: ConsolidationWrite): Promise<void>;
}

export interface GraphSnapshotStore {
  getSnapshot(filter?: GraphFilter): Promise<GraphSnapshot>;
  clear(): Promise<void>;
}

export interface AbstractGraphStore extends MessageStore, KnowledgeStore, GraphSnapshotStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  probe(): Promise<boolean>;
}
