import { DEFAULT_CONNECT_TIMEOUT_MS, logWarn } from "@dbnav/core";
import { ConnectionFailedError, getErrorMessage } from "@dbnav/errors";
import { MongoClient } from "mongodb";

export interface ConnectOptions {
  /** Bound on server selection and socket connect (default 10_000) */
  readonly timeoutMs?: number;
}

/**
 * Connect to the server and ping the primary. On failure the client is
 * closed before the error is thrown.
 *
 * @throws ConnectionFailedError for a malformed connection string, an
 *   unreachable server or a failed ping
 */
export async function connectMongo(
  connectionString: string,
  options: ConnectOptions = {},
): Promise<MongoClient> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

  let client: MongoClient | undefined;
  try {
    client = new MongoClient(connectionString, {
      serverSelectionTimeoutMS: timeoutMs,
      connectTimeoutMS: timeoutMs,
    });
    await client.connect();
  } catch (error) {
    if (client !== undefined) await closeQuietly(client);
    throw new ConnectionFailedError(
      "failed to connect to MongoDB",
      getErrorMessage(error),
      error instanceof Error ? error : undefined,
    );
  }

  try {
    await client.db("admin").command({ ping: 1 });
  } catch (error) {
    await closeQuietly(client);
    throw new ConnectionFailedError(
      "failed to ping MongoDB",
      getErrorMessage(error),
      error instanceof Error ? error : undefined,
    );
  }

  return client;
}

async function closeQuietly(client: MongoClient): Promise<void> {
  try {
    await client.close();
  } catch (error) {
    logWarn("mongodb", `Failed to close client: ${getErrorMessage(error)}`);
  }
}
