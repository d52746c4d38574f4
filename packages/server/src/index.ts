/**
 * @fan-auth/server: FAN agent and Web Site roles on Fastify.
 */

export { buildApp, createStorage, start, type AppOverrides } from "./app.js";
export { config, type ServerConfig, type StorageDriverName } from "./config.js";
export { ATTEMPT_HEADER } from "./routes/auth.js";
export {
  AGENT_IDENTIFIER,
  DocumentService,
  type DocumentRequest,
  type DocumentServiceOptions,
  type ServedDocument,
} from "./services/documents.js";
export { loadSigningKeys, parseSigningKeys } from "./services/signing-keys.js";
export {
  FileSystemStorage,
  SqliteStorage,
  type StorageDriver,
  type StoredDocument,
} from "./services/storage.js";
