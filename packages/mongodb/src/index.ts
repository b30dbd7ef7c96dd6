/**
 * @dbnav/mongodb: DataSource on the official MongoDB driver
 */

export const PACKAGE_NAME = "@dbnav/mongodb" as const;

export { type ConnectOptions, connectMongo } from "./connect.js";
export { MongoDataSource } from "./data-source.js";
export { renderMongoDocument } from "./render.js";
