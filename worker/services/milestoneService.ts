import type { CardPatch, TrackerStore, TrackerTx } from '../db/store';
import { classifyActivationConflict } from './conflictClassifier';
import { TrackerError, notFound, withStorageErrors } from './errors';
import { applyCardPatch } from './versionedStore';
import { now } from './utils';
import type { CardRecord, MilestoneRecord } from './types';

export const CARD_TITLE_MAX = 120;

export type ActivationSnapshot = {
  milestone: MilestoneRecord;
  /** Cards assigned to the milestone, now in the project's active scope. */
  cardsReleased: number;
  /** Tasks whose own or card milestone is the activated one. */
  tasksReleased: number;
};

/**
 * Moves a ready milestone to active. The project row lock orders concurrent activations
 * in the same project; the partial unique index on active milestones backs it up.
 */
export const activateMilestone = (store: TrackerStore, milestoneId: number, projectId: number) =>
  withStorageErrors(
    'activateMilestone',
    (): Promise<ActivationSnapshot> =>
      store.transaction(async (tx) => {
        const project = await tx.getProject(projectId, { lock: true });
        if (!project) throw notFound('Project');

        const milestone = await tx.activateMilestone(milestoneId, projectId, now());
        if (!milestone) {
          const current = await tx.getMilestone(milestoneId);
          const activeSibling = await tx.findActiveMilestone(projectId, milestoneId);
          throw classifyActivationConflict(current, projectId, activeSibling);
        }

        const counts = await tx.countMilestoneContent(milestoneId);
        return { milestone, cardsReleased: counts.cards, tasksReleased: counts.tasks };
      })
  );

/** Active → completed once every task and card in the milestone is done. Never moves backwards. */
export const completeMilestoneIfDone = async (tx: TrackerTx, milestoneId: number): Promise<MilestoneRecord | null> => {
  const completed = await tx.completeMilestoneIfDone(milestoneId, now());
  if (completed) console.info(`[milestone] ${completed.id} completed`);
  return completed;
};

const assertMovable = async (tx: TrackerTx, card: CardRecord, target: number | null) => {
  if (target === card.milestoneId) return;

  const current = card.milestoneId === null ? null : await tx.getMilestone(card.milestoneId);
  if (current?.state === 'completed') {
    throw new TrackerError('INVALID_TRANSITION', 'Cards of a completed milestone cannot be moved.');
  }

  if (target === null) {
    if (current && current.state !== 'ready') {
      throw new TrackerError('INVALID_TRANSITION', 'Content of an active milestone cannot return to the pool.');
    }
    return;
  }

  const milestone = await tx.getMilestone(target);
  if (!milestone || milestone.projectId !== card.projectId) {
    throw new TrackerError('VALIDATION_ERROR', 'Target milestone does not belong to the card project.');
  }
  if (milestone.state === 'completed') {
    throw new TrackerError('INVALID_TRANSITION', 'Cannot move a card into a completed milestone.');
  }
};

/**
 * Versioned card edit. `milestoneId` absent leaves the assignment alone; `null` returns
 * the card to the pool.
 */
export const moveCard = (store: TrackerStore, cardId: number, expectedVersion: number, patch: CardPatch) =>
  withStorageErrors(
    'moveCard',
    (): Promise<CardRecord> =>
      store.transaction(async (tx) => {
        const normalized: CardPatch = { ...patch };
        if (patch.title !== undefined) {
          normalized.title = patch.title.trim();
          if (normalized.title.length === 0 || normalized.title.length > CARD_TITLE_MAX) {
            throw new TrackerError('VALIDATION_ERROR', `Card title must be 1-${CARD_TITLE_MAX} characters.`);
          }
        }
        const card = await tx.getCard(cardId);
        if (!card) throw notFound('Card');
        if (patch.milestoneId !== undefined) await assertMovable(tx, card, patch.milestoneId);
        return applyCardPatch(tx, cardId, expectedVersion, normalized);
      })
  );
