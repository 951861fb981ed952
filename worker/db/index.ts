export * from './schema';
export { getPgDb as getDb, closePgDb, resolveDatabaseUrl } from './pg';
export type { TrackerDatabase } from './pg';
export type { TrackerStore, TrackerTx } from './store';
