import neo4j, {
  isInt,
  isNode,
  type Driver,
  type ManagedTransaction,
  type Node,
  type Session,
  type SessionConfig
} from "neo4j-driver";
import type {
  AbstractGraphStore,
  ConsolidationWrite,
  CypherStore,
  GraphEdge,
  GraphFilter,
  GraphNode,
  GraphSnapshot,
  MemoryNodeLabel,
  MemoryRelationType,
  QueryParams,
  QueryRecord,
  ShortTermMessage
} from "@convomem/shared";
import type { AppConfig } from "../config.js";
import { edgeId } from "../services/graphView.js";

export interface Neo4jGraphStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

type AccessMode = "READ" | "WRITE";

const memoryLabels: readonly MemoryNodeLabel[] = ["ChatSession", "ShortTermMessage", "Knowledge"];
const relationTypes: readonly MemoryRelationType[] = [
  "HAS_MESSAGE",
  "NEXT",
  "YIELDED",
  "CONTRIBUTED_TO"
];

const APPEND_MESSAGES_QUERY = `
  UNWIND $messages AS message
  MERGE (s:ChatSession {id: message.sessionId})
  ON CREATE SET s.createdAt = message.createdAt
  MERGE (m:ShortTermMessage {id: message.id})
  ON CREATE SET
    m.sessionId = message.sessionId,
    m.role = message.role,
    m.content = message.content,
    m.sequence = message.sequence,
    m.createdAt = message.createdAt,
    m.expiresAt = message.expiresAt
  MERGE (s)-[:HAS_MESSAGE]->(m)
`;

// Drops NEXT links that no longer point at the sequence successor.
const UNLINK_STALE_NEXT_QUERY = `
  UNWIND $sessionIds AS sessionId
  MATCH (m:ShortTermMessage {sessionId: sessionId})
  WITH sessionId, m ORDER BY m.sequence ASC
  WITH sessionId, collect(m) AS ordered
  UNWIND range(0, size(ordered) - 1) AS i
  WITH ordered, i, ordered[i] AS current
  MATCH (current)-[r:NEXT]->(target)
  WHERE i = size(ordered) - 1 OR target <> ordered[i + 1]
  DELETE r
`;

const LINK_NEXT_QUERY = `
  UNWIND $sessionIds AS sessionId
  MATCH (m:ShortTermMessage {sessionId: sessionId})
  WITH sessionId, m ORDER BY m.sequence ASC
  WITH sessionId, collect(m) AS ordered
  UNWIND range(0, size(ordered) - 2) AS i
  WITH ordered[i] AS previous, ordered[i + 1] AS next
  MERGE (previous)-[:NEXT]->(next)
`;

const CREATE_KNOWLEDGE_QUERY = `
  MERGE (s:ChatSession {id: $knowledge.sessionId})
  ON CREATE SET s.createdAt = $knowledge.createdAt
  CREATE (k:Knowledge {
    id: $knowledge.id,
    sessionId: $knowledge.sessionId,
    summary: $knowledge.summary,
    note: $knowledge.note,
    createdAt: $knowledge.createdAt
  })
  MERGE (s)-[:YIELDED]->(k)
  WITH k
  UNWIND $knowledge.sourceMessageIds AS sourceId
  MATCH (m:ShortTermMessage {id: sourceId, sessionId: $knowledge.sessionId})
  MERGE (m)-[:CONTRIBUTED_TO]->(k)
  RETURN count(m) AS linked
`;

/**
 * Rewrites routing URIs to their direct bolt form. A single-instance server
 * has no routing table, and the driver refuses `neo4j://` against it.
 */
export function normalizeNeo4jUri(uri: string): string {
  const schemes: Array<[string, string]> = [
    ["neo4j+ssc://", "bolt+ssc://"],
    ["neo4j+s://", "bolt+s://"],
    ["neo4j://", "bolt://"]
  ];
  for (const [from, to] of schemes) {
    if (uri.startsWith(from)) {
      return to + uri.slice(from.length);
    }
  }
  return uri;
}

export class Neo4jGraphStore implements AbstractGraphStore, CypherStore {
  private driver: Driver | null = null;
  private connectPromise: Promise<void> | null = null;

  constructor(private readonly config: Neo4jGraphStoreConfig) {}

  static fromConfig(config: AppConfig): Neo4jGraphStore {
    return new Neo4jGraphStore({
      uri: normalizeNeo4jUri(config.NEO4J_URI),
      user: config.NEO4J_USER,
      password: config.NEO4J_PASSWORD,
      database: config.NEO4J_DATABASE
    });
  }

  connect(): Promise<void> {
    if (this.driver) {
      return Promise.resolve();
    }
    if (!this.connectPromise) {
      this.connectPromise = this.openDriver().finally(() => {
        this.connectPromise = null;
      });
    }
    return this.connectPromise;
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    const driver = this.driver;
    this.driver = null;
    await driver.close();
  }

  async probe(): Promise<boolean> {
    try {
      await this.connect();
      await this.read("RETURN 1 AS ok");
      return true;
    } catch {
      return false;
    }
  }

  async read(query: string, params: QueryParams = {}): Promise<QueryRecord[]> {
    return this.withSession("READ", async (session) =>
      session.executeRead(async (tx) => {
        const result = await tx.run(query, params);
        return result.records.map((record) => record.toObject());
      })
    );
  }

  async write(query: string, params: QueryParams = {}): Promise<QueryRecord[]> {
    return this.withSession("WRITE", async (session) =>
      session.executeWrite(async (tx) => {
        const result = await tx.run(query, params);
        return result.records.map((record) => record.toObject());
      })
    );
  }

  async appendMessages(messages: ShortTermMessage[]): Promise<void> {
    if (messages.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.executeWrite((tx) => this.appendInTransaction(tx, messages));
    });
  }

  async listLiveMessages(sessionId: string, now: Date): Promise<ShortTermMessage[]> {
    const records = await this.read(
      `
      MATCH (m:ShortTermMessage {sessionId: $sessionId})
      WHERE m.expiresAt > $now
      RETURN m
      ORDER BY m.sequence ASC
      `,
      { sessionId, now: now.toISOString() }
    );

    const messages: ShortTermMessage[] = [];
    for (const record of records) {
      const node = record.m;
      if (isNode(node)) {
        messages.push(this.mapMessage(node));
      }
    }
    return messages;
  }

  async writeConsolidation(input: ConsolidationWrite): Promise<void> {
    const { knowledge } = input;

    await this.withSession("WRITE", async (session) => {
      await session.executeWrite(async (tx) => {
        await this.appendInTransaction(tx, input.messages);

        const result = await tx.run(CREATE_KNOWLEDGE_QUERY, {
          knowledge: {
            id: knowledge.id,
            sessionId: knowledge.sessionId,
            summary: knowledge.summary,
            note: knowledge.note ?? null,
            createdAt: knowledge.createdAt.toISOString(),
            sourceMessageIds: knowledge.sourceMessageIds
          }
        });

        const linked = this.toNumber(result.records[0]?.get("linked"), 0);
        if (linked !== knowledge.sourceMessageIds.length) {
          // throwing rolls the transaction back
          throw new Error(
            `Knowledge ${knowledge.id} resolved ${linked} of ${knowledge.sourceMessageIds.length} source messages`
          );
        }
      });
    });
  }

  async getSnapshot(filter: GraphFilter = {}): Promise<GraphSnapshot> {
    const sessionId = filter.sessionId ?? null;

    const nodeRecords = await this.read(
      `
      MATCH (n)
      WHERE (n:ChatSession OR n:ShortTermMessage OR n:Knowledge)
        AND ($sessionId IS NULL OR coalesce(n.sessionId, n.id) = $sessionId)
      RETURN n
      `,
      { sessionId }
    );
    const edgeRecords = await this.read(
      `
      MATCH (a)-[r:HAS_MESSAGE|NEXT|YIELDED|CONTRIBUTED_TO]->(b)
      WHERE $sessionId IS NULL
         OR (coalesce(a.sessionId, a.id) = $sessionId AND coalesce(b.sessionId, b.id) = $sessionId)
      RETURN a.id AS source, b.id AS target, type(r) AS type
      `,
      { sessionId }
    );

    const nodes: GraphNode[] = [];
    for (const record of nodeRecords) {
      const node = record.n;
      if (isNode(node)) {
        const mapped = this.mapGraphNode(node);
        if (mapped) {
          nodes.push(mapped);
        }
      }
    }

    const edges: GraphEdge[] = [];
    for (const record of edgeRecords) {
      const type = this.toRelationType(record.type);
      const source = this.toString(record.source, "");
      const target = this.toString(record.target, "");
      if (type && source && target) {
        edges.push({ id: edgeId(type, source, target), type, source, target, properties: {} });
      }
    }

    return { nodes, edges };
  }

  async clear(): Promise<void> {
    await this.write(
      `
      MATCH (n)
      WHERE n:ChatSession OR n:ShortTermMessage OR n:Knowledge
      DETACH DELETE n
      `
    );
  }

  private async openDriver(): Promise<void> {
    const driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await driver.verifyConnectivity();
      this.driver = driver;
      await this.ensureSchema();
    } catch (error) {
      this.driver = null;
      await driver.close();
      throw error;
    }
  }

  private async ensureSchema(): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      for (const label of memoryLabels) {
        await session.run(
          `CREATE CONSTRAINT ${label.toLowerCase()}_id IF NOT EXISTS FOR (n:${label}) REQUIRE n.id IS UNIQUE`
        );
      }
      await session.run(
        "CREATE INDEX short_term_message_session IF NOT EXISTS FOR (m:ShortTermMessage) ON (m.sessionId)"
      );
    });
  }

  private async appendInTransaction(
    tx: ManagedTransaction,
    messages: ShortTermMessage[]
  ): Promise<void> {
    if (messages.length === 0) {
      return;
    }

    const sessionIds = [...new Set(messages.map((message) => message.sessionId))];
    await tx.run(APPEND_MESSAGES_QUERY, {
      messages: messages.map((message) => this.serializeMessage(message))
    });
    await tx.run(UNLINK_STALE_NEXT_QUERY, { sessionIds });
    await tx.run(LINK_NEXT_QUERY, { sessionIds });
  }

  private async withSession<T>(
    mode: AccessMode,
    work: (session: Session) => Promise<T>
  ): Promise<T> {
    if (!this.driver) {
      throw new Error("Neo4j driver is not connected");
    }

    const sessionConfig: SessionConfig = {
      defaultAccessMode: mode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.driver.session(sessionConfig);
    try {
      return await work(session);
    } finally {
      await session.close();
    }
  }

  private serializeMessage(message: ShortTermMessage): Record<string, unknown> {
    return {
      id: message.id,
      sessionId: message.sessionId,
      role: message.role,
      content: message.content,
      sequence: neo4j.int(message.sequence),
      createdAt: message.createdAt.toISOString(),
      expiresAt: message.expiresAt.toISOString()
    };
  }

  private mapMessage(node: Node): ShortTermMessage {
    const props = node.properties;
    return {
      id: this.toString(props.id, node.elementId),
      sessionId: this.toString(props.sessionId, ""),
      role: this.toString(props.role, "user"),
      content: this.toString(props.content, ""),
      sequence: this.toNumber(props.sequence, 0),
      createdAt: this.toDate(props.createdAt),
      expiresAt: this.toDate(props.expiresAt)
    };
  }

  private mapGraphNode(node: Node): GraphNode | null {
    const label = memoryLabels.find((candidate) => node.labels.includes(candidate));
    if (!label) {
      return null;
    }

    const properties: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(node.properties)) {
      properties[key] = isInt(value) ? value.toNumber() : value;
    }

    return {
      id: this.toString(properties.id, node.elementId),
      label,
      properties
    };
  }

  private toRelationType(value: unknown): MemoryRelationType | null {
    return relationTypes.find((type) => type === value) ?? null;
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toNumber(value: unknown, fallback: number): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (isInt(value)) {
      return value.toNumber();
    }
    return fallback;
  }

  private toDate(value: unknown): Date {
    if (typeof value === "string" || typeof value === "number") {
      const parsed = new Date(value);
      if (!Number.isNaN(parsed.getTime())) {
        return parsed;
      }
    }
    return new Date(0);
  }
}
