import { TrackerError } from './errors';

export const TASK_TITLE_MAX = 56;
export const PRIORITY_MIN = 1;
export const PRIORITY_MAX = 5;

/** Returns the trimmed title, or throws VALIDATION_ERROR when it is empty or too long. */
export const checkTaskTitle = (title: string): string => {
  const trimmed = title.trim();
  if (trimmed.length === 0 || trimmed.length > TASK_TITLE_MAX) {
    throw new TrackerError('VALIDATION_ERROR', `Task title must be 1-${TASK_TITLE_MAX} characters.`);
  }
  return trimmed;
};

export const checkPriority = (priority: number): number => {
  if (!Number.isInteger(priority) || priority < PRIORITY_MIN || priority > PRIORITY_MAX) {
    throw new TrackerError('VALIDATION_ERROR', `Priority must be an integer from ${PRIORITY_MIN} to ${PRIORITY_MAX}.`);
  }
  return priority;
};
