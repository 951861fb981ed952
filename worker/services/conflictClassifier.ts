import type { TrackerTx, TaskMutation } from '../db/store';
import { TrackerError } from './errors';
import type { ActivationErrorCode, LifecycleErrorCode } from './errors';
import type { CardRecord, MilestoneRecord, TaskRecord } from './types';

export type TaskAttempt = {
  kind: TaskMutation['kind'];
  actorId: number;
};

/**
 * The from-state guard of a task transition, evaluated against the row as it is now.
 * Returns null when the state allows the attempt; version is not considered here.
 */
export const checkTaskGuard = (
  current: TaskRecord,
  attempt: TaskAttempt
): TrackerError<LifecycleErrorCode> | null => {
  if (current.status === 'completed') {
    return new TrackerError('INVALID_TRANSITION', `Cannot ${attempt.kind} a completed task.`);
  }
  if (current.status === 'claimed') {
    if (attempt.kind === 'claim') {
      return new TrackerError(
        'ALREADY_CLAIMED',
        current.claimedBy === attempt.actorId ? 'You already hold this task.' : 'Task is claimed by another user.'
      );
    }
    if (current.claimedBy !== attempt.actorId) {
      return new TrackerError('NOT_AUTHORIZED', `Only the claiming user can ${attempt.kind} this task.`);
    }
    return null;
  }
  if (attempt.kind !== 'claim') {
    return new TrackerError('INVALID_TRANSITION', `Cannot ${attempt.kind} a task that is not claimed.`);
  }
  return null;
};

/** Explains why a conditional task write matched no row. */
export const classifyTaskConflict = (
  current: TaskRecord | null,
  attempt: TaskAttempt
): TrackerError<LifecycleErrorCode> => {
  if (!current) return new TrackerError('NOT_FOUND', 'Task not found.');
  return (
    checkTaskGuard(current, attempt) ??
    new TrackerError('VERSION_CONFLICT', `Task changed since version was read (now at version ${current.version}).`)
  );
};

export const diagnoseTaskConflict = async (
  tx: TrackerTx,
  taskId: number,
  attempt: TaskAttempt
): Promise<TrackerError<LifecycleErrorCode>> => classifyTaskConflict(await tx.getTask(taskId), attempt);

export const classifyCardConflict = (current: CardRecord | null): TrackerError<'NOT_FOUND' | 'VERSION_CONFLICT'> => {
  if (!current) return new TrackerError('NOT_FOUND', 'Card not found.');
  return new TrackerError('VERSION_CONFLICT', `Card changed since version was read (now at version ${current.version}).`);
};

export const classifyActivationConflict = (
  milestone: MilestoneRecord | null,
  projectId: number,
  activeSibling: MilestoneRecord | null
): TrackerError<ActivationErrorCode> => {
  if (!milestone || milestone.projectId !== projectId) {
    return new TrackerError('NOT_FOUND', 'Milestone not found.');
  }
  if (activeSibling) {
    return new TrackerError('ALREADY_ACTIVE', `Milestone "${activeSibling.name}" is already active in this project.`);
  }
  return new TrackerError('INVALID_TRANSITION', `Cannot activate a milestone in state ${milestone.state}.`);
};
