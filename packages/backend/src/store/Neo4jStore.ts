import neo4j, { type Driver, type Session, type SessionConfig } from "neo4j-driver";
import type {
  ChunkKind,
  ChunkStore,
  Document,
  DocumentChunk,
  DocumentStatus,
  IndexRecord,
  IndexRecordMetadata,
  StoreLifecycle,
  VectorIndex,
  VectorIndexInfo,
  VectorMatch,
  VectorQueryFilter
} from "@finscope/shared";
import { appConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface Neo4jStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  embeddingDimensions: number;
}

type AccessMode = "READ" | "WRITE";

const CHUNK_INDEX_NAME = "chunk_embedding";

export class Neo4jStore implements ChunkStore, VectorIndex, StoreLifecycle {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jStoreConfig) {}

  static fromEnv(): Neo4jStore {
    return new Neo4jStore({
      uri: appConfig.NEO4J_URI,
      user: appConfig.NEO4J_USER,
      password: appConfig.NEO4J_PASSWORD,
      database: appConfig.NEO4J_DATABASE,
      embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(this.config.uri, neo4j.auth.basic(this.config.user, this.config.password));

    try {
      await this.driver.verifyConnectivity();
      await this.ensureIndexes();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await session.run("RETURN 1 AS ok");
      });
      return true;
    } catch (error) {
      logger.debug({ err: error }, "Neo4j health check failed");
      return false;
    }
  }

  async saveDocument(doc: Document): Promise<void> {
    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        MERGE (d:Document {id: $doc.id})
        SET
          d.filename = $doc.filename,
          d.fileType = $doc.fileType,
          d.fileSize = $doc.fileSize,
          d.status = $doc.status,
          d.uploadedAt = $doc.uploadedAt,
          d.ingestedAt = $doc.ingestedAt,
          d.metadata = $doc.metadata,
          d.errorMessage = $doc.errorMessage
        `,
        { doc: this.serializeDocument(doc) }
      );
    });
  }

  async getDocuments(): Promise<Document[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (d:Document)
        RETURN d
        ORDER BY d.uploadedAt DESC, d.id ASC
        `
      );

      return result.records.map((record) => this.mapDocument(record.get("d")));
    });
  }

  async getDocumentById(id: string): Promise<Document | null> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(`MATCH (d:Document {id: $id}) RETURN d`, { id });
      const record = result.records[0];
      return record ? this.mapDocument(record.get("d")) : null;
    });
  }

  async saveChunks(chunks: DocumentChunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        UNWIND $chunks AS chunk
        MERGE (c:Chunk {id: chunk.id})
        SET
          c.documentId = chunk.documentId,
          c.documentTitle = chunk.documentTitle,
          c.pageNumber = chunk.pageNumber,
          c.kind = chunk.kind,
          c.index = chunk.index,
          c.start = chunk.start,
          c.end = chunk.end,
          c.content = chunk.content,
          c.tableIndex = chunk.tableIndex
        MERGE (d:Document {id: chunk.documentId})
        MERGE (d)-[rel:HAS_CHUNK]->(c)
        SET rel.index = chunk.index
        `,
        { chunks: chunks.map((chunk) => this.serializeChunk(chunk)) }
      );
    });
  }

  async getChunksByDocument(docId: string): Promise<DocumentChunk[]> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        MATCH (c:Chunk {documentId: $docId})
        RETURN c
        ORDER BY c.index ASC
        `,
        { docId }
      );

      return result.records.map((record) => this.mapDocumentChunk(record.get("c")));
    });
  }

  async getChunksByIds(ids: string[]): Promise<DocumentChunk[]> {
    if (ids.length === 0) {
      return [];
    }

    return this.withSession("READ", async (session) => {
      const result = await session.run(`MATCH (c:Chunk) WHERE c.id IN $ids RETURN c`, { ids });
      const byId = new Map(
        result.records.map((record) => {
          const chunk = this.mapDocumentChunk(record.get("c"));
          return [chunk.id, chunk] as const;
        })
      );
      return ids.map((id) => byId.get(id)).filter((chunk): chunk is DocumentChunk => chunk !== undefined);
    });
  }

  async deleteDocument(docId: string): Promise<string[]> {
    return this.withSession("WRITE", async (session) => {
      const result = await session.run(
        `
        MATCH (d:Document {id: $docId})
        OPTIONAL MATCH (d)-[:HAS_CHUNK]->(chunk:Chunk)
        WITH d, collect(chunk) AS chunks, [c IN collect(chunk) | c.id] AS chunkIds
        FOREACH (c IN chunks | DETACH DELETE c)
        DETACH DELETE d
        RETURN chunkIds
        `,
        { docId }
      );
      const record = result.records[0];
      return record ? this.toStringArray(record.get("chunkIds")) : [];
    });
  }

  async deleteChunks(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.run(`MATCH (c:Chunk) WHERE c.id IN $ids DETACH DELETE c`, { ids });
    });
  }

  async upsert(record: IndexRecord): Promise<void> {
    if (record.vector.length !== this.config.embeddingDimensions) {
      throw new ConfigurationError(
        `Index dimension is ${this.config.embeddingDimensions}; received a vector of ${record.vector.length}`
      );
    }

    const info = await this.describe();
    if (info.embeddingModel !== null && info.embeddingModel !== record.metadata.embeddingModel) {
      throw new ConfigurationError(
        `Index holds ${info.embeddingModel} vectors; refusing to write ${record.metadata.embeddingModel}`
      );
    }

    await this.withSession("WRITE", async (session) => {
      await session.executeWrite(async (tx) => {
        await tx.run(
          `
          MERGE (c:Chunk {id: $id})
          SET
            c.embedding = $vector,
            c.documentId = $metadata.documentId,
            c.documentTitle = $metadata.documentTitle,
            c.pageNumber = $metadata.pageNumber,
            c.embeddingModel = $metadata.embeddingModel
          `,
          {
            id: record.id,
            vector: record.vector,
            metadata: { ...record.metadata, pageNumber: neo4j.int(record.metadata.pageNumber) }
          }
        );
        await tx.run(
          `
          MERGE (m:IndexMeta {name: $name})
          SET m.embeddingModel = $model, m.dimensions = $dimensions
          `,
          {
            name: CHUNK_INDEX_NAME,
            model: record.metadata.embeddingModel,
            dimensions: neo4j.int(record.vector.length)
          }
        );
      });
    });
  }

  async query(vector: number[], k: number, filter?: VectorQueryFilter): Promise<VectorMatch[]> {
    if (vector.length === 0 || k <= 0) {
      return [];
    }

    const documentIds = filter?.documentIds && filter.documentIds.length > 0 ? filter.documentIds : null;

    return this.withSession("READ", async (session) => {
      // Scoped queries score every chunk of the named documents, not a filtered slice
      // of the global nearest neighbours.
      const result = documentIds
        ? await session.run(
            `
            MATCH (node:Chunk)
            WHERE node.documentId IN $documentIds AND node.embedding IS NOT NULL
            WITH node, vector.similarity.cosine(node.embedding, $vector) AS score
            RETURN node, score
            ORDER BY score DESC, node.pageNumber ASC, node.id ASC
            LIMIT $k
            `,
            { documentIds, vector, k: neo4j.int(k) }
          )
        : await session.run(
            `
            CALL db.index.vector.queryNodes($indexName, $k, $vector)
            YIELD node, score
            RETURN node, score
            ORDER BY score DESC, node.pageNumber ASC, node.id ASC
            `,
            { indexName: CHUNK_INDEX_NAME, vector, k: neo4j.int(k) }
          );

      return result.records.map((record) => {
        const props = this.asRecord(this.nodeProperties(record.get("node")));
        return {
          id: this.toString(props.id, ""),
          // Neo4j reports cosine similarity rescaled to [0, 1]; map it back to [-1, 1].
          score: this.toNumber(record.get("score")) * 2 - 1,
          metadata: this.mapIndexMetadata(props)
        };
      });
    });
  }

  async delete(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        MATCH (c:Chunk) WHERE c.id IN $ids
        REMOVE c.embedding, c.embeddingModel
        `,
        { ids }
      );
    });
  }

  async describe(): Promise<VectorIndexInfo> {
    return this.withSession("READ", async (session) => {
      const result = await session.run(
        `
        OPTIONAL MATCH (m:IndexMeta {name: $name})
        CALL {
          MATCH (c:Chunk) WHERE c.embedding IS NOT NULL
          RETURN count(c) AS recordCount
        }
        RETURN m.embeddingModel AS embeddingModel, m.dimensions AS dimensions, recordCount
        `,
        { name: CHUNK_INDEX_NAME }
      );
      const record = result.records[0];
      const recordCount = record ? this.toNumber(record.get("recordCount")) : 0;
      if (!record || recordCount === 0) {
        return { embeddingModel: null, dimensions: null, recordCount: 0 };
      }

      return {
        embeddingModel: this.toOptionalString(record.get("embeddingModel")) ?? null,
        dimensions: this.toOptionalNumber(record.get("dimensions")) ?? null,
        recordCount
      };
    });
  }

  private async ensureIndexes(): Promise<void> {
    const dimension = Math.max(1, Math.floor(this.config.embeddingDimensions));

    await this.withSession("WRITE", async (session) => {
      await session.run(
        `
        CREATE VECTOR INDEX ${CHUNK_INDEX_NAME} IF NOT EXISTS
        FOR (c:Chunk) ON (c.embedding)
        OPTIONS {indexConfig: {\`vector.dimensions\`: ${dimension}, \`vector.similarity_function\`: 'cosine'}}
        `
      );
      await session.run(
        `CREATE CONSTRAINT document_id_unique IF NOT EXISTS FOR (d:Document) REQUIRE d.id IS UNIQUE`
      );
      await session.run(`CREATE CONSTRAINT chunk_id_unique IF NOT EXISTS FOR (c:Chunk) REQUIRE c.id IS UNIQUE`);
      await session.run(`CREATE INDEX chunk_document_idx IF NOT EXISTS FOR (c:Chunk) ON (c.documentId)`);
    });
  }

  private async withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new Error("Neo4jStore is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private nodeProperties(value: unknown): unknown {
    if (value instanceof neo4j.types.Node) {
      return value.properties;
    }
    return {};
  }

  private mapIndexMetadata(props: Record<string, unknown>): IndexRecordMetadata {
    return {
      documentId: this.toString(props.documentId, ""),
      documentTitle: this.toString(props.documentTitle, ""),
      pageNumber: this.toNumber(props.pageNumber, 0),
      embeddingModel: this.toString(props.embeddingModel, "")
    };
  }

  private mapDocument(value: unknown): Document {
    const props = this.asRecord(this.nodeProperties(value));
    const metadataRecord = this.parseJsonRecord(props.metadata);
    const metadata: Document["metadata"] = {};

    const pageCount = this.toOptionalNumber(metadataRecord.pageCount);
    const chunkCount = this.toOptionalNumber(metadataRecord.chunkCount);
    const unindexedCount = this.toOptionalNumber(metadataRecord.unindexedCount);
    const warningCount = this.toOptionalNumber(metadataRecord.warningCount);

    if (pageCount !== undefined) {
      metadata.pageCount = pageCount;
    }
    if (chunkCount !== undefined) {
      metadata.chunkCount = chunkCount;
    }
    if (unindexedCount !== undefined) {
      metadata.unindexedCount = unindexedCount;
    }
    if (warningCount !== undefined) {
      metadata.warningCount = warningCount;
    }

    const document: Document = {
      id: this.toString(props.id, ""),
      filename: this.toString(props.filename, ""),
      fileType: props.fileType === "pdf" ? "pdf" : "txt",
      fileSize: this.toNumber(props.fileSize, 0),
      status: this.toDocumentStatus(props.status),
      uploadedAt: this.toDate(props.uploadedAt, new Date(0)),
      metadata
    };

    const ingestedAt = this.toOptionalDate(props.ingestedAt);
    if (ingestedAt) {
      document.ingestedAt = ingestedAt;
    }

    const errorMessage = this.toOptionalString(props.errorMessage);
    if (errorMessage !== undefined) {
      document.errorMessage = errorMessage;
    }

    return document;
  }

  private mapDocumentChunk(value: unknown): DocumentChunk {
    const props = this.asRecord(this.nodeProperties(value));
    const content = this.toString(props.content, "");
    const kind: ChunkKind = props.kind === "table" ? "table" : "text";

    const chunk: DocumentChunk = {
      id: this.toString(props.id, ""),
      documentId: this.toString(props.documentId, ""),
      documentTitle: this.toString(props.documentTitle, ""),
      pageNumber: this.toNumber(props.pageNumber, 0),
      kind,
      index: this.toNumber(props.index, 0),
      start: this.toNumber(props.start, 0),
      end: this.toNumber(props.end, 0),
      content,
      length: content.length
    };

    const tableIndex = this.toOptionalNumber(props.tableIndex);
    if (tableIndex !== undefined) {
      chunk.tableIndex = tableIndex;
    }

    return chunk;
  }

  private serializeDocument(doc: Document): Record<string, unknown> {
    return {
      id: doc.id,
      filename: doc.filename,
      fileType: doc.fileType,
      fileSize: doc.fileSize,
      status: doc.status,
      uploadedAt: doc.uploadedAt.toISOString(),
      ingestedAt: doc.ingestedAt ? doc.ingestedAt.toISOString() : null,
      metadata: JSON.stringify(doc.metadata ?? {}),
      errorMessage: doc.errorMessage ?? null
    };
  }

  private serializeChunk(chunk: DocumentChunk): Record<string, unknown> {
    return {
      id: chunk.id,
      documentId: chunk.documentId,
      documentTitle: chunk.documentTitle,
      pageNumber: neo4j.int(chunk.pageNumber),
      kind: chunk.kind,
      index: neo4j.int(chunk.index),
      start: neo4j.int(chunk.start),
      end: neo4j.int(chunk.end),
      content: chunk.content,
      tableIndex: chunk.tableIndex === undefined ? null : neo4j.int(chunk.tableIndex)
    };
  }

  private parseJsonRecord(value: unknown): Record<string, unknown> {
    if (typeof value !== "string") {
      return this.asRecord(value);
    }
    try {
      return this.asRecord(JSON.parse(value));
    } catch {
      return {};
    }
  }

  private asRecord(value: unknown): Record<string, unknown> {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return {};
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

  private toOptionalString(value: unknown): string | undefined {
    if (typeof value === "string") {
      return value;
    }
    return undefined;
  }

  private toStringArray(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => String(item));
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (neo4j.isInt(value)) {
      return value.toNumber();
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  }

  private toOptionalNumber(value: unknown): number | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.toNumber(value);
  }

  private toDate(value: unknown, fallback: Date): Date {
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
      return value;
    }

    if (typeof value === "string" || typeof value === "number") {
      const parsed = new Date(value);
      if (!Number.isNaN(parsed.getTime())) {
        return parsed;
      }
    }

    return fallback;
  }

  private toOptionalDate(value: unknown): Date | undefined {
    if (value === undefined || value === null || value === "") {
      return undefined;
    }

    const parsed = this.toDate(value, new Date(Number.NaN));
    if (Number.isNaN(parsed.getTime())) {
      return undefined;
    }
    return parsed;
  }

  private toDocumentStatus(value: unknown): DocumentStatus {
    const statuses: DocumentStatus[] = ["uploading", "parsing", "chunking", "indexing", "completed", "error"];
    return statuses.find((status) => status === value) ?? "error";
  }
}
