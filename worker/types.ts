import type { TrackerStore } from './db/store';

export type Variables = {
  store: TrackerStore;
  actorId: number;
};

export type AppEnv = {
  Variables: Variables;
};
