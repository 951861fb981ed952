import type { CardPatch, TaskMutation, TrackerTx } from '../db/store';
import { classifyCardConflict, diagnoseTaskConflict } from './conflictClassifier';
import type { CardRecord, TaskRecord } from './types';

/**
 * Conditional write followed, on a miss, by a re-read that names the reason. The write
 * itself is a single statement, so the row never changes between guard and update.
 */
export const applyTaskMutation = async (
  tx: TrackerTx,
  taskId: number,
  expectedVersion: number,
  mutation: TaskMutation
): Promise<TaskRecord> => {
  const updated = await tx.updateTaskIfVersion(taskId, expectedVersion, mutation);
  if (updated) return updated;
  throw await diagnoseTaskConflict(tx, taskId, { kind: mutation.kind, actorId: mutation.actorId });
};

export const applyCardPatch = async (
  tx: TrackerTx,
  cardId: number,
  expectedVersion: number,
  patch: CardPatch
): Promise<CardRecord> => {
  const updated = await tx.updateCardIfVersion(cardId, expectedVersion, patch);
  if (updated) return updated;
  throw classifyCardConflict(await tx.getCard(cardId));
};
