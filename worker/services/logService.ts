import type { TrackerStore } from '../db/store';
import { now } from './utils';

export type LogKind = 'rule_execution_record_failure';

export const recordLog = async (store: TrackerStore, kind: LogKind, payload: Record<string, unknown>) => {
  await store.insertObservabilityLog(kind, payload, now());
};
