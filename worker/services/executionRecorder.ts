import type { TrackerStore, TrackerTx } from '../db/store';
import { TrackerError, notFound, withStorageErrors } from './errors';
import { clampNumber, now } from './utils';
import type {
  ExecutionOutcome,
  ResourceType,
  RuleExecutionRecord,
  RuleMetrics,
  TimeWindow,
  WorkflowMetrics,
} from './types';

export type ExecutionInput = ExecutionOutcome & {
  ruleId: number;
  originType: ResourceType;
  originId: number;
  userId: number | null;
};

/**
 * Appends one evaluation record. Returns null only for an applied record whose
 * (rule, origin) slot is already taken.
 */
export const recordExecution = (tx: TrackerTx, input: ExecutionInput): Promise<RuleExecutionRecord | null> =>
  tx.insertRuleExecution({ ...input, createdAt: now() });

export const resolveWindow = (from?: number, to?: number): TimeWindow => {
  const window = { from: from ?? 0, to: to ?? now() };
  if (window.from > window.to) {
    throw new TrackerError('VALIDATION_ERROR', '`from` must not be later than `to`.');
  }
  return window;
};

export const getRuleMetrics = (store: TrackerStore, ruleId: number, window: TimeWindow): Promise<RuleMetrics> =>
  withStorageErrors('getRuleMetrics', async () => {
    const metrics = await store.getRuleMetrics(ruleId, window);
    if (!metrics) throw notFound('Rule');
    return metrics;
  });

export const getWorkflowMetrics = (store: TrackerStore, orgId: number, window: TimeWindow): Promise<WorkflowMetrics[]> =>
  withStorageErrors('getWorkflowMetrics', () => store.getWorkflowMetrics(orgId, window));

export type ExecutionListOptions = {
  page?: number;
  pageSize?: number;
};

export const listRuleExecutions = async (
  store: TrackerStore,
  ruleId: number,
  window: TimeWindow,
  options: ExecutionListOptions = {}
): Promise<{ data: RuleExecutionRecord[]; total: number; page: number; pageSize: number }> => {
  const page = Math.max(1, options.page ?? 1);
  const pageSize = clampNumber(options.pageSize, 1, 100) ?? 50;
  const { data, total } = await withStorageErrors('listRuleExecutions', () =>
    store.listRuleExecutions(ruleId, window, { limit: pageSize, offset: (page - 1) * pageSize })
  );
  return { data, total, page, pageSize };
};
