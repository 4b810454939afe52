// Account store adapters
export { MemoryAccountStore, type MemoryAccountStoreOptions } from "./memory";
export {
  MongoAccountStore,
  connectMongoStore,
  ACCOUNT_INDEXES,
  type AccountDocument,
  type MongoAccountStoreOptions,
  type MongoStoreHandle,
} from "./mongo";
