export { pool, connectDatabase } from './connection';
export { migrate, rollback } from './migrate';
export { createPgStore, createPgUnitOfWork } from './pg-store';
export type { DataStore, UnitOfWork } from './store';
