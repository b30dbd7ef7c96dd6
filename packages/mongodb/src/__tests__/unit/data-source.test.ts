import { Lister } from "@dbnav/core";
import { BackendTimeoutError } from "@dbnav/errors";
import { MongoClient, ObjectId } from "mongodb";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MongoDataSource } from "../../data-source.js";

const mocks = vi.hoisted(() => {
  const state: {
    collections: Record<string, unknown>[];
    documents: Record<string, unknown>[];
    iterationError: Error | undefined;
    stallAfter: number | undefined;
  } = {
    collections: [],
    documents: [],
    iterationError: undefined,
    stallAfter: undefined,
  };

  const closeCursor = vi.fn(async () => {});
  const cursorOver = (items: () => Record<string, unknown>[]) => ({
    async *[Symbol.asyncIterator]() {
      let read = 0;
      for (const item of items()) {
        if (state.iterationError !== undefined) throw state.iterationError;
        if (state.stallAfter !== undefined && read >= state.stallAfter) {
          await new Promise<never>(() => {});
        }
        read++;
        yield item;
      }
    },
    close: closeCursor,
  });

  const listDatabases = vi.fn(async (_options: object) => ({
    databases: [{ name: "admin" }, { name: "shop" }],
  }));
  const listCollections = vi.fn((_filter: object, _options: object) =>
    cursorOver(() => state.collections),
  );
  const find = vi.fn((_filter: object, _options: object) => cursorOver(() => state.documents));
  const findOne = vi.fn(
    async (_filter: { _id: unknown }, _options: object): Promise<Record<string, unknown> | null> =>
      null,
  );
  const collection = vi.fn((_name: string) => ({ find, findOne }));
  const db = vi.fn((_name?: string) => ({
    admin: () => ({ listDatabases }),
    listCollections,
    collection,
  }));

  return { state, listDatabases, listCollections, closeCursor, find, findOne, collection, db };
});

vi.mock("mongodb", async (importOriginal) => {
  const actual = await importOriginal<typeof import("mongodb")>();
  class FakeMongoClient {
    db = mocks.db;
  }
  return { ...actual, MongoClient: FakeMongoClient };
});

const ID = "6512abf0c0ffee0000000001";

function callOptions(timeoutMs: number, signal = new AbortController().signal) {
  return { timeoutMs, signal };
}

describe("MongoDataSource", () => {
  let dataSource: MongoDataSource;

  beforeEach(() => {
    mocks.state.collections = [{ name: "orders" }, { name: "users" }];
    mocks.state.documents = [];
    mocks.state.iterationError = undefined;
    mocks.state.stallAfter = undefined;
    dataSource = new MongoDataSource(new MongoClient("mongodb://localhost:27017"));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
    vi.restoreAllMocks();
  });

  describe("listDatabaseNames", () => {
    it("asks for names only and forwards the deadline", async () => {
      await expect(dataSource.listDatabaseNames(callOptions(5000))).resolves.toEqual([
        "admin",
        "shop",
      ]);
      expect(mocks.listDatabases).toHaveBeenCalledWith({ nameOnly: true, maxTimeMS: 5000 });
    });
  });

  describe("listCollectionNames", () => {
    it("lists the collections of the named database and closes the cursor", async () => {
      await expect(dataSource.listCollectionNames("shop", callOptions(250))).resolves.toEqual([
        "orders",
        "users",
      ]);
      expect(mocks.db).toHaveBeenCalledWith("shop");
      expect(mocks.listCollections).toHaveBeenCalledWith({}, { nameOnly: true, maxTimeMS: 250 });
      expect(mocks.closeCursor).toHaveBeenCalledTimes(1);
    });
  });

  describe("findDocuments", () => {
    it("sends the limit and closes the cursor", async () => {
      mocks.state.documents = [{ _id: 1 }, { _id: 2 }];

      await expect(
        dataSource.findDocuments("shop", "orders", 5, callOptions(5000)),
      ).resolves.toEqual([{ _id: 1 }, { _id: 2 }]);
      expect(mocks.collection).toHaveBeenCalledWith("orders");
      expect(mocks.find).toHaveBeenCalledWith({}, { maxTimeMS: 5000, limit: 5 });
      expect(mocks.closeCursor).toHaveBeenCalledTimes(1);
    });

    it("omits the limit when none is given", async () => {
      await dataSource.findDocuments("shop", "orders", undefined, callOptions(5000));

      expect(mocks.find).toHaveBeenCalledWith({}, { maxTimeMS: 5000 });
    });

    it("closes the cursor when iteration fails", async () => {
      mocks.state.documents = [{ _id: 1 }];
      mocks.state.iterationError = new Error("cursor killed");

      await expect(
        dataSource.findDocuments("shop", "orders", 5, callOptions(5000)),
      ).rejects.toThrow("cursor killed");
      expect(mocks.closeCursor).toHaveBeenCalledTimes(1);
    });

    it("logs a cursor that fails to close without failing the call", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      mocks.state.documents = [{ _id: 1 }];
      mocks.closeCursor.mockRejectedValueOnce(new Error("not connected"));

      await expect(
        dataSource.findDocuments("shop", "orders", 5, callOptions(5000)),
      ).resolves.toEqual([{ _id: 1 }]);
      expect(warn).toHaveBeenCalledWith(
        "[mongodb] Failed to close cursor on shop.orders: not connected",
      );
    });

    it("closes a stalled cursor as soon as the signal aborts", async () => {
      mocks.state.documents = [{ _id: 1 }, { _id: 2 }];
      mocks.state.stallAfter = 1;
      const controller = new AbortController();

      void dataSource.findDocuments("shop", "orders", undefined, callOptions(5000, controller.signal));
      await Promise.resolve();
      expect(mocks.closeCursor).not.toHaveBeenCalled();

      controller.abort();
      expect(mocks.closeCursor).toHaveBeenCalledTimes(1);
    });

    it("does not read from a cursor whose signal already aborted", async () => {
      mocks.state.documents = [{ _id: 1 }];
      const controller = new AbortController();
      controller.abort();

      await expect(
        dataSource.findDocuments("shop", "orders", 5, callOptions(5000, controller.signal)),
      ).resolves.toEqual([]);
      expect(mocks.closeCursor).toHaveBeenCalledTimes(1);
    });

    it("has closed the cursor by the time a timed-out listing rejects", async () => {
      vi.useFakeTimers();
      mocks.state.documents = [{ _id: 1 }, { _id: 2 }];
      mocks.state.stallAfter = 1;
      const lister = new Lister(dataSource, { timeoutMs: 50 });

      const pending = lister.list(["shop", "orders"], { showAll: true });
      const assertion = expect(pending).rejects.toThrow(
        "find documents in 'shop.orders': operation timed out after 50ms",
      );
      await vi.advanceTimersByTimeAsync(50);
      await assertion;

      await expect(pending).rejects.toBeInstanceOf(BackendTimeoutError);
      expect(mocks.closeCursor).toHaveBeenCalledTimes(1);
    });
  });

  describe("findDocumentById", () => {
    it("looks the document up by ObjectId", async () => {
      mocks.findOne.mockResolvedValueOnce({ _id: ID, total: 3 });

      await expect(
        dataSource.findDocumentById("shop", "orders", ID, callOptions(5000)),
      ).resolves.toEqual({ _id: ID, total: 3 });

      const call = mocks.findOne.mock.calls[0];
      expect(call).toBeDefined();
      if (call === undefined) return;
      const [filter, options] = call;
      expect(filter._id).toBeInstanceOf(ObjectId);
      if (!(filter._id instanceof ObjectId)) return;
      expect(filter._id.toHexString()).toBe(ID);
      expect(options).toEqual({ maxTimeMS: 5000 });
    });

    it("resolves null when nothing matches", async () => {
      await expect(
        dataSource.findDocumentById("shop", "orders", ID, callOptions(5000)),
      ).resolves.toBeNull();
    });
  });
});
