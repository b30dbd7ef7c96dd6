export const PACKAGE_NAME = "@dbnav/test-utils" as const;

export {
  createMockDataSource,
  type DataSourceFixture,
  type MockDataSource,
  never,
} from "./data-source.js";
