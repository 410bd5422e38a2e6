export * from "./schema/index.js";
export {
  createDbClient,
  closeDbClient,
  type DbClient,
  type DbClientOptions,
  type DbExecutor,
} from "./client.js";
export * from "./repositories/index.js";
export * from "./memory.js";
