import type { DataSource, DataSourceCallOptions, Document } from "@dbnav/core";
import { type Mock, vi } from "vitest";

/**
 * In-memory server layout: database → collection → documents.
 * Insertion order is the "server-reported" order.
 */
export type DataSourceFixture = Readonly<
  Record<string, Readonly<Record<string, readonly Document[]>>>
>;

export interface MockDataSource extends DataSource {
  listDatabaseNames: Mock<(options: DataSourceCallOptions) => Promise<readonly string[]>>;
  listCollectionNames: Mock<
    (database: string, options: DataSourceCallOptions) => Promise<readonly string[]>
  >;
  findDocuments: Mock<
    (
      database: string,
      collection: string,
      limit: number | undefined,
      options: DataSourceCallOptions,
    ) => Promise<readonly Document[]>
  >;
  findDocumentById: Mock<
    (
      database: string,
      collection: string,
      id: string,
      options: DataSourceCallOptions,
    ) => Promise<Document | null>
  >;
}

/**
 * Create a DataSource backed by a fixture, with every method a Vitest spy.
 *
 * Documents are matched by `String(document._id)`. Unknown databases and
 * collections behave like an empty server-side namespace.
 *
 * @example
 * ```typescript
 * const dataSource = createMockDataSource({ admin: { logs: [{ _id: "a" }] } });
 * dataSource.listDatabaseNames.mockRejectedValueOnce(new Error("connection reset"));
 * ```
 */
export function createMockDataSource(fixture: DataSourceFixture = {}): MockDataSource {
  const collectionsOf = (database: string): Readonly<Record<string, readonly Document[]>> =>
    fixture[database] ?? {};
  const documentsOf = (database: string, collection: string): readonly Document[] =>
    collectionsOf(database)[collection] ?? [];

  return {
    listDatabaseNames: vi.fn(
      async (_options: DataSourceCallOptions): Promise<readonly string[]> => Object.keys(fixture),
    ),
    listCollectionNames: vi.fn(
      async (database: string, _options: DataSourceCallOptions): Promise<readonly string[]> =>
        Object.keys(collectionsOf(database)),
    ),
    findDocuments: vi.fn(
      async (
        database: string,
        collection: string,
        limit: number | undefined,
        _options: DataSourceCallOptions,
      ): Promise<readonly Document[]> => {
        const documents = documentsOf(database, collection);
        return limit === undefined ? documents : documents.slice(0, limit);
      },
    ),
    findDocumentById: vi.fn(
      async (
        database: string,
        collection: string,
        id: string,
        _options: DataSourceCallOptions,
      ): Promise<Document | null> =>
        documentsOf(database, collection).find((document) => String(document._id) === id) ??
        null,
    ),
  };
}

/**
 * A promise that never settles, for exercising call deadlines.
 */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}
