export { SequelizeObjectStore } from './SequelizeObjectStore.js';
export type { SequelizeObjectStoreOptions, JoinRelation } from './SequelizeObjectStore.js';
export { SequelizeTransactionManager } from './SequelizeTransactionManager.js';
export { attributeKind } from './attributeKind.js';
