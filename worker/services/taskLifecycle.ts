import type { TaskMutation, TrackerStore, TrackerTx } from '../db/store';
import { checkTaskGuard } from './conflictClassifier';
import { TrackerError, notFound, withStorageErrors } from './errors';
import { recordLog } from './logService';
import { completeMilestoneIfDone } from './milestoneService';
import { emptyEngineResult, mergeEngineResults, onTransition } from './ruleEngine';
import type { EngineResult, RecordingFailure } from './ruleEngine';
import { deriveCardState } from './serializers';
import { checkPriority, checkTaskTitle } from './taskLimits';
import { applyTaskMutation } from './versionedStore';
import { now } from './utils';
import type {
  CardRecord,
  CardState,
  MilestoneRecord,
  ProjectRecord,
  TaskEventType,
  TaskRecord,
} from './types';

export { TASK_TITLE_MAX, PRIORITY_MIN, PRIORITY_MAX } from './taskLimits';

export type TransitionResult = EngineResult & {
  task: TaskRecord;
  completedMilestone: MilestoneRecord | null;
};

export type ReleaseAllResult = EngineResult & {
  released: TaskRecord[];
};

export type TaskEdit = {
  title?: string;
  description?: string | null;
  priority?: number;
  typeId?: number;
};

const EVENT_TYPES: Record<'claim' | 'release' | 'complete', TaskEventType> = {
  claim: 'task_claimed',
  release: 'task_released',
  complete: 'task_completed',
};

const requireProject = async (tx: TrackerTx, projectId: number): Promise<ProjectRecord> => {
  const project = await tx.getProject(projectId);
  if (!project) throw notFound('Project');
  return project;
};

/** Feeds the card's own transition to the engine when a task write changed its derived state. */
const emitCardTransition = async (
  tx: TrackerTx,
  project: ProjectRecord,
  card: CardRecord,
  before: CardState,
  triggeredBy: number | undefined
): Promise<EngineResult> => {
  if (card.state === before) return emptyEngineResult();
  return onTransition(tx, {
    resourceType: 'card',
    resourceId: card.id,
    orgId: project.orgId,
    projectId: project.id,
    toState: card.state,
    triggeredBy,
  });
};

const emitTaskTransition = (tx: TrackerTx, project: ProjectRecord, task: TaskRecord, triggeredBy: number | undefined) =>
  onTransition(tx, {
    resourceType: 'task',
    resourceId: task.id,
    orgId: project.orgId,
    projectId: project.id,
    cardId: task.cardId ?? undefined,
    taskTypeId: task.typeId,
    toState: task.status,
    triggeredBy,
  });

/** Execution-record failures are reported after commit; they never fail the caller. */
const reportRecordingFailures = async (store: TrackerStore, failures: RecordingFailure[]) => {
  for (const failure of failures) {
    try {
      await recordLog(store, 'rule_execution_record_failure', failure);
    } catch (error) {
      console.warn('[taskLifecycle] failed to write observability log:', error);
    }
  }
};

const runTransition = async (
  store: TrackerStore,
  operation: string,
  taskId: number,
  expectedVersion: number,
  mutation: Exclude<TaskMutation, { kind: 'edit' }>
): Promise<TransitionResult> => {
  const result = await withStorageErrors(operation, () =>
    store.transaction(async (tx): Promise<TransitionResult> => {
      const current = await tx.getTask(taskId);
      if (!current) throw notFound('Task');
      const blocked = checkTaskGuard(current, mutation);
      if (blocked) throw blocked;

      const cardBefore = current.cardId === null ? null : await tx.getCard(current.cardId);
      const task = await applyTaskMutation(tx, taskId, expectedVersion, mutation);
      // Read before any rule adds tasks to the card: only this write counts as the card's transition.
      const cardAfter = task.cardId === null ? null : await tx.getCard(task.cardId);
      const project = await requireProject(tx, task.projectId);
      await tx.insertTaskEvent({
        orgId: project.orgId,
        projectId: project.id,
        taskId: task.id,
        actorUserId: mutation.actorId,
        eventType: EVENT_TYPES[mutation.kind],
        createdAt: now(),
      });

      const engine = await emitTaskTransition(tx, project, task, mutation.actorId);
      if (cardBefore && cardAfter) {
        mergeEngineResults(engine, await emitCardTransition(tx, project, cardAfter, cardBefore.state, mutation.actorId));
      }

      let completedMilestone: MilestoneRecord | null = null;
      if (mutation.kind === 'complete') {
        const milestoneId = task.milestoneId ?? cardBefore?.milestoneId ?? null;
        if (milestoneId !== null) completedMilestone = await completeMilestoneIfDone(tx, milestoneId);
      }

      return { ...engine, task, completedMilestone };
    })
  );
  await reportRecordingFailures(store, result.recordingFailures);
  return result;
};

export const claimTask = (store: TrackerStore, taskId: number, actorId: number, expectedVersion: number) =>
  runTransition(store, 'claimTask', taskId, expectedVersion, { kind: 'claim', actorId, at: now() });

export const releaseTask = (store: TrackerStore, taskId: number, actorId: number, expectedVersion: number) =>
  runTransition(store, 'releaseTask', taskId, expectedVersion, { kind: 'release', actorId });

export const completeTask = (store: TrackerStore, taskId: number, actorId: number, expectedVersion: number) =>
  runTransition(store, 'completeTask', taskId, expectedVersion, { kind: 'complete', actorId, at: now() });

const validateEdit = async (tx: TrackerTx, task: TaskRecord, edit: TaskEdit): Promise<TaskEdit> => {
  const normalized: TaskEdit = { ...edit };
  if (edit.title !== undefined) normalized.title = checkTaskTitle(edit.title);
  if (edit.priority !== undefined) checkPriority(edit.priority);
  if (edit.typeId !== undefined && !(await tx.taskTypeBelongsToProject(edit.typeId, task.projectId))) {
    throw new TrackerError('VALIDATION_ERROR', 'Task type does not belong to the task project.');
  }
  return normalized;
};

/** The claimer edits a claimed task. Edits are not transitions and trigger no rules. */
export const editTask = (
  store: TrackerStore,
  taskId: number,
  actorId: number,
  expectedVersion: number,
  edit: TaskEdit
): Promise<TaskRecord> =>
  withStorageErrors('editTask', () =>
    store.transaction(async (tx) => {
      const current = await tx.getTask(taskId);
      if (!current) throw notFound('Task');
      const blocked = checkTaskGuard(current, { kind: 'edit', actorId });
      if (blocked) throw blocked;
      const normalized = await validateEdit(tx, current, edit);
      return applyTaskMutation(tx, taskId, expectedVersion, { kind: 'edit', actorId, ...normalized });
    })
  );

/**
 * System release of every task a user holds in a project, used when the user leaves it.
 * Events carry no triggering user, so rules limited to user actions are suppressed.
 */
export const releaseAllForUser = async (
  store: TrackerStore,
  projectId: number,
  userId: number
): Promise<ReleaseAllResult> => {
  const result = await withStorageErrors('releaseAllForUser', () =>
    store.transaction(async (tx): Promise<ReleaseAllResult> => {
      const project = await requireProject(tx, projectId);
      const released = await tx.releaseTasksClaimedBy(projectId, userId);
      const engine = emptyEngineResult();
      const releasedPerCard = new Map<number, number>();
      for (const task of released) {
        if (task.cardId !== null) releasedPerCard.set(task.cardId, (releasedPerCard.get(task.cardId) ?? 0) + 1);
      }
      const cardTransitions: Array<{ card: CardRecord; before: CardState }> = [];
      for (const [cardId, count] of releasedPerCard) {
        const card = await tx.getCard(cardId);
        if (!card) continue;
        const before = deriveCardState({
          taskCount: card.taskCount,
          claimedCount: card.claimedCount + count,
          completedCount: card.completedCount,
        });
        cardTransitions.push({ card, before });
      }

      for (const task of released) {
        await tx.insertTaskEvent({
          orgId: project.orgId,
          projectId: project.id,
          taskId: task.id,
          actorUserId: null,
          eventType: 'task_released',
          createdAt: now(),
        });
        mergeEngineResults(engine, await emitTaskTransition(tx, project, task, undefined));
      }
      for (const { card, before } of cardTransitions) {
        mergeEngineResults(engine, await emitCardTransition(tx, project, card, before, undefined));
      }

      return { ...engine, released };
    })
  );
  await reportRecordingFailures(store, result.recordingFailures);
  return result;
};
