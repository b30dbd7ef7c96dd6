import { type DataSource, type DataSourceCallOptions, type Document, logWarn } from "@dbnav/core";
import { getErrorMessage } from "@dbnav/errors";
import { type AbstractCursor, type MongoClient, ObjectId } from "mongodb";

/**
 * DataSource over a connected MongoClient.
 *
 * Every call forwards its deadline as `maxTimeMS`. Cursors live for one call
 * and are closed before it settles, or as soon as the caller's signal aborts.
 * The client is borrowed: closing it is the caller's job.
 */
export class MongoDataSource implements DataSource {
  constructor(private readonly client: MongoClient) {}

  async listDatabaseNames(options: DataSourceCallOptions): Promise<readonly string[]> {
    const result = await this.client
      .db()
      .admin()
      .listDatabases({ nameOnly: true, maxTimeMS: options.timeoutMs });
    return result.databases.map((database) => database.name);
  }

  async listCollectionNames(
    database: string,
    options: DataSourceCallOptions,
  ): Promise<readonly string[]> {
    const cursor = this.client
      .db(database)
      .listCollections({}, { nameOnly: true, maxTimeMS: options.timeoutMs });
    const collections = await drainCursor(cursor, options.signal, `collections of ${database}`);
    return collections.map((collection) => collection.name);
  }

  async findDocuments(
    database: string,
    collection: string,
    limit: number | undefined,
    options: DataSourceCallOptions,
  ): Promise<readonly Document[]> {
    const cursor = this.client
      .db(database)
      .collection(collection)
      .find({}, { maxTimeMS: options.timeoutMs, ...(limit !== undefined ? { limit } : {}) });
    return drainCursor(cursor, options.signal, `${database}.${collection}`);
  }

  /**
   * @param id - 24 hexadecimal characters; callers check the format first
   */
  async findDocumentById(
    database: string,
    collection: string,
    id: string,
    options: DataSourceCallOptions,
  ): Promise<Document | null> {
    return this.client
      .db(database)
      .collection(collection)
      .findOne({ _id: ObjectId.createFromHexString(id) }, { maxTimeMS: options.timeoutMs });
  }
}

/**
 * Read every item of `cursor`. The cursor is closed once: when `signal`
 * aborts, or when reading ends, whichever comes first. Items read after an
 * abort are dropped.
 */
async function drainCursor<T>(
  cursor: AbstractCursor<T>,
  signal: AbortSignal,
  namespace: string,
): Promise<T[]> {
  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= cursor.close().catch((error: unknown) => {
      logWarn("mongodb", `Failed to close cursor on ${namespace}: ${getErrorMessage(error)}`);
    });
    return closing;
  };
  const onAbort = (): void => {
    void close();
  };

  signal.addEventListener("abort", onAbort, { once: true });
  try {
    const items: T[] = [];
    if (signal.aborted) return items;
    for await (const item of cursor) {
      if (signal.aborted) break;
      items.push(item);
    }
    return items;
  } finally {
    signal.removeEventListener("abort", onAbort);
    await close();
  }
}
