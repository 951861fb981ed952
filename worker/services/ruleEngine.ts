import type { RuleQuery, TrackerTx } from '../db/store';
import { recordExecution } from './executionRecorder';
import { checkPriority, checkTaskTitle } from './taskLimits';
import { errorMessage, now } from './utils';
import type {
  ResourceType,
  RuleExecutionRecord,
  RuleTarget,
  ScopedRule,
  SuppressionReason,
  TaskRecord,
  TransitionEvent,
} from './types';

/** A suppressed evaluation whose record could not be written. */
export type RecordingFailure = {
  ruleId: number;
  originType: ResourceType;
  originId: number;
  reason: SuppressionReason;
  message: string;
};

export type EngineResult = {
  executions: RuleExecutionRecord[];
  createdTasks: TaskRecord[];
  recordingFailures: RecordingFailure[];
};

export const emptyEngineResult = (): EngineResult => ({ executions: [], createdTasks: [], recordingFailures: [] });

export const mergeEngineResults = (into: EngineResult, from: EngineResult) => {
  into.executions.push(...from.executions);
  into.createdTasks.push(...from.createdTasks);
  into.recordingFailures.push(...from.recordingFailures);
};

const toRuleQuery = (event: TransitionEvent): RuleQuery => ({
  orgId: event.orgId,
  projectId: event.projectId,
  resourceType: event.resourceType,
  toState: event.toState,
  taskTypeId: event.resourceType === 'task' ? event.taskTypeId : undefined,
});

export const targetMatches = (target: RuleTarget, event: TransitionEvent): boolean => {
  switch (event.resourceType) {
    case 'task':
      if (target.resourceType !== 'task' || target.toState !== event.toState) return false;
      // A type filter never matches an event that does not say which type it is.
      return target.taskTypeId === undefined || target.taskTypeId === event.taskTypeId;
    case 'card':
      return target.resourceType === 'card' && target.toState === event.toState;
  }
};

/**
 * Suppression checks in their fixed order. The scope check belongs to not_matching: a
 * workflow moved to another project after the candidate query no longer matches.
 */
export const evaluateSuppression = ({ rule, workflow }: ScopedRule, event: TransitionEvent): SuppressionReason | null => {
  if (!rule.active || !workflow.active) return 'inactive';
  if (event.triggeredBy === undefined && rule.userTriggeredOnly) return 'not_user_triggered';
  const inScope =
    workflow.orgId === event.orgId && (workflow.projectId === null || workflow.projectId === event.projectId);
  if (!inScope || !targetMatches(rule.target, event)) return 'not_matching';
  return null;
};

const recordSuppression = async (
  tx: TrackerTx,
  event: TransitionEvent,
  ruleId: number,
  reason: SuppressionReason,
  result: EngineResult
) => {
  try {
    const record = await tx.savepoint((sp) =>
      recordExecution(sp, {
        ruleId,
        originType: event.resourceType,
        originId: event.resourceId,
        userId: event.triggeredBy ?? null,
        outcome: 'suppressed',
        suppressionReason: reason,
      })
    );
    if (record) result.executions.push(record);
  } catch (error) {
    console.warn(`[ruleEngine] failed to record suppressed execution for rule ${ruleId}:`, error);
    result.recordingFailures.push({
      ruleId,
      originType: event.resourceType,
      originId: event.resourceId,
      reason,
      message: errorMessage(error),
    });
  }
};

const materializeTemplates = async (tx: TrackerTx, { rule, workflow }: ScopedRule, event: TransitionEvent) => {
  const templates = await tx.listRuleTemplates(rule.id);
  const created: TaskRecord[] = [];
  const cardId = event.resourceType === 'card' ? event.resourceId : event.cardId ?? null;
  for (const template of templates) {
    created.push(
      await tx.insertTask({
        projectId: event.projectId,
        typeId: template.typeId,
        cardId,
        milestoneId: null,
        title: checkTaskTitle(template.name),
        description: template.description,
        priority: checkPriority(template.priority),
        createdBy: event.triggeredBy ?? workflow.createdBy,
        createdFromRuleId: rule.id,
        createdAt: now(),
      })
    );
  }
  return created;
};

/**
 * Evaluates every candidate rule for one transition inside the caller's transaction.
 * Task creation errors propagate and roll the transition back; failures to write a
 * suppressed record do not.
 */
export const onTransition = async (tx: TrackerTx, event: TransitionEvent): Promise<EngineResult> => {
  const result = emptyEngineResult();
  const candidates = await tx.findMatchingRules(toRuleQuery(event));

  for (const candidate of candidates) {
    const scoped = await tx.getScopedRule(candidate.rule.id);
    // Deleted after the candidate query; there is no rule left to record against.
    if (!scoped) continue;

    const reason = evaluateSuppression(scoped, event);
    if (reason) {
      await recordSuppression(tx, event, scoped.rule.id, reason, result);
      continue;
    }

    if (await tx.findAppliedExecution(scoped.rule.id, event.resourceType, event.resourceId)) {
      await recordSuppression(tx, event, scoped.rule.id, 'idempotent', result);
      continue;
    }

    const applied = await recordExecution(tx, {
      ruleId: scoped.rule.id,
      originType: event.resourceType,
      originId: event.resourceId,
      userId: event.triggeredBy ?? null,
      outcome: 'applied',
      suppressionReason: null,
    });
    if (!applied) {
      // Another transaction took the slot between the check and the insert.
      await recordSuppression(tx, event, scoped.rule.id, 'idempotent', result);
      continue;
    }
    result.executions.push(applied);
    result.createdTasks.push(...(await materializeTemplates(tx, scoped, event)));
  }

  return result;
};
