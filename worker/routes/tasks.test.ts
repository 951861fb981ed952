import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createApp } from '../app';
import { MemoryTrackerStore } from '../db/memoryStore';
import { TrackerError } from '../services/errors';
import type { TrackerErrorCode } from '../services/errors';
import type { TransitionResult } from '../services/taskLifecycle';
import type { TaskRecord } from '../services/types';

vi.mock('../services/taskLifecycle', () => ({
  claimTask: vi.fn(),
  releaseTask: vi.fn(),
  completeTask: vi.fn(),
  editTask: vi.fn(),
  releaseAllForUser: vi.fn(),
}));

import { claimTask, completeTask, editTask } from '../services/taskLifecycle';

const task: TaskRecord = {
  id: 5,
  projectId: 1,
  typeId: 2,
  cardId: null,
  milestoneId: null,
  title: 'Fix login',
  description: null,
  priority: 3,
  status: 'claimed',
  claimedBy: 7,
  claimedAt: 100,
  completedAt: null,
  createdBy: 7,
  createdAt: 50,
  createdFromRuleId: null,
  version: 2,
};

const transition: TransitionResult = {
  task,
  executions: [],
  createdTasks: [],
  recordingFailures: [],
  completedMilestone: null,
};

const store = new MemoryTrackerStore();
const app = createApp(store);

const post = (path: string, body: unknown, headers: Record<string, string> = { 'X-User-Id': '7' }) =>
  app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });

describe('tasksRoute', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('requires the acting user header', async () => {
    const res = await post('/api/tasks/5/claim', { version: 1 }, {});

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'UNAUTHENTICATED' } });
    expect(claimTask).not.toHaveBeenCalled();
  });

  it('rejects a body without a version', async () => {
    const res = await post('/api/tasks/5/claim', {});

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_BODY' } });
  });

  it('rejects a non-numeric task id', async () => {
    const res = await post('/api/tasks/abc/claim', { version: 1 });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_PARAMS' } });
  });

  it('claims a task for the acting user', async () => {
    vi.mocked(claimTask).mockResolvedValue(transition);

    const res = await post('/api/tasks/5/claim', { version: 1 });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, data: transition });
    expect(claimTask).toHaveBeenCalledWith(store, 5, 7, 1);
  });

  const statusCases: Array<[TrackerErrorCode, number]> = [
    ['NOT_FOUND', 404],
    ['NOT_AUTHORIZED', 403],
    ['INVALID_TRANSITION', 409],
    ['ALREADY_CLAIMED', 409],
    ['VERSION_CONFLICT', 409],
    ['VALIDATION_ERROR', 400],
    ['STORAGE_ERROR', 500],
  ];

  it.each(statusCases)('maps %s to HTTP %i', async (code, status) => {
    vi.mocked(completeTask).mockRejectedValue(new TrackerError(code, 'nope'));

    const res = await post('/api/tasks/5/complete', { version: 2 });

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ success: false, error: { code, message: 'nope' } });
  });

  it('answers unexpected failures with a generic error', async () => {
    vi.mocked(completeTask).mockRejectedValue(new Error('socket hang up'));
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await post('/api/tasks/5/complete', { version: 2 });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error.' },
    });
    consoleError.mockRestore();
  });

  it('passes only the provided edit fields', async () => {
    vi.mocked(editTask).mockResolvedValue({ ...task, title: 'Fix logout', version: 3 });

    const res = await app.request('/api/tasks/5', {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json', 'X-User-Id': '7' },
      body: JSON.stringify({ version: 2, title: 'Fix logout', description: null }),
    });

    expect(res.status).toBe(200);
    expect(editTask).toHaveBeenCalledWith(store, 5, 7, 2, { title: 'Fix logout', description: null });
  });
});
