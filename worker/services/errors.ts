export type TrackerErrorCode =
  | 'NOT_FOUND'
  | 'NOT_AUTHORIZED'
  | 'INVALID_TRANSITION'
  | 'ALREADY_CLAIMED'
  | 'VERSION_CONFLICT'
  | 'ALREADY_ACTIVE'
  | 'VALIDATION_ERROR'
  | 'STORAGE_ERROR';

export type LifecycleErrorCode = Exclude<TrackerErrorCode, 'ALREADY_ACTIVE'>;

export type ActivationErrorCode = Extract<
  TrackerErrorCode,
  'NOT_FOUND' | 'ALREADY_ACTIVE' | 'INVALID_TRANSITION' | 'STORAGE_ERROR'
>;

export class TrackerError<C extends TrackerErrorCode = TrackerErrorCode> extends Error {
  readonly code: C;

  constructor(code: C, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrackerError';
    this.code = code;
  }
}

export const isTrackerError = (error: unknown): error is TrackerError => error instanceof TrackerError;

export const notFound = (entity: string) => new TrackerError('NOT_FOUND', `${entity} not found.`);

/**
 * Runs a unit of work against the store and converts anything that is not already a
 * TrackerError into STORAGE_ERROR, keeping the original error as `cause`.
 */
export const withStorageErrors = async <T>(operation: string, work: () => Promise<T>): Promise<T> => {
  try {
    return await work();
  } catch (error) {
    if (isTrackerError(error)) throw error;
    console.error(`[${operation}] storage failure:`, error);
    throw new TrackerError('STORAGE_ERROR', `Storage failure during ${operation}.`, { cause: error });
  }
};
