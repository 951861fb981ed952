import { describe, it, expect } from 'vitest';
import { MemoryTrackerStore } from '../db/memoryStore';
import { claimTask, completeTask, editTask, releaseAllForUser, releaseTask } from './taskLifecycle';

const setup = () => {
  const store = new MemoryTrackerStore();
  const orgId = store.addOrg();
  const alice = store.addUser(orgId, 'alice@example.com');
  const bob = store.addUser(orgId, 'bob@example.com');
  const projectId = store.addProject(orgId);
  const typeId = store.addTaskType(projectId);
  return { store, orgId, alice, bob, projectId, typeId };
};

const storedTask = (store: MemoryTrackerStore, taskId: number) => store.tables.tasks.find((row) => row.id === taskId);

describe('task lifecycle', () => {
  it('claims an available task and bumps its version', async () => {
    const { store, alice, projectId, typeId } = setup();
    const taskId = store.addTask({ projectId, typeId, createdBy: alice });

    const result = await claimTask(store, taskId, alice, 1);

    expect(result.task).toMatchObject({ status: 'claimed', claimedBy: alice, version: 2 });
    expect(result.task.claimedAt).toEqual(expect.any(Number));
    expect(store.tables.taskEvents).toEqual([
      expect.objectContaining({ taskId, eventType: 'task_claimed', actorUserId: alice }),
    ]);
  });

  it('rejects a second claim with the stale version as already claimed', async () => {
    const { store, alice, bob, projectId, typeId } = setup();
    const taskId = store.addTask({ projectId, typeId, createdBy: alice });
    await claimTask(store, taskId, alice, 1);

    await expect(claimTask(store, taskId, bob, 1)).rejects.toHaveProperty('code', 'ALREADY_CLAIMED');
    expect(storedTask(store, taskId)).toMatchObject({ claimedBy: alice, version: 2 });
  });

  it('lets exactly one of two racing claims win', async () => {
    const { store, alice, bob, projectId, typeId } = setup();
    const taskId = store.addTask({ projectId, typeId, createdBy: alice });

    const outcomes = await Promise.allSettled([claimTask(store, taskId, alice, 1), claimTask(store, taskId, bob, 1)]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['fulfilled', 'rejected']);
    expect(outcomes[1]).toHaveProperty('reason.code', 'ALREADY_CLAIMED');
    expect(storedTask(store, taskId)).toMatchObject({ status: 'claimed', claimedBy: alice, version: 2 });
    expect(store.tables.taskEvents).toHaveLength(1);
  });

  it('rejects completion by a user who does not hold the claim', async () => {
    const { store, alice, bob, projectId, typeId } = setup();
    const taskId = store.addTask({ projectId, typeId, createdBy: alice });
    await claimTask(store, taskId, alice, 1);

    await expect(completeTask(store, taskId, bob, 2)).rejects.toHaveProperty('code', 'NOT_AUTHORIZED');
    expect(storedTask(store, taskId)).toMatchObject({ status: 'claimed', version: 2 });
  });

  it('adds exactly one to the version per successful transition', async () => {
    const { store, alice, bob, projectId, typeId } = setup();
    const taskId = store.addTask({ projectId, typeId, createdBy: alice });

    const claimed = await claimTask(store, taskId, alice, 1);
    const released = await releaseTask(store, taskId, alice, claimed.task.version);
    await expect(releaseTask(store, taskId, alice, released.task.version)).rejects.toHaveProperty(
      'code',
      'INVALID_TRANSITION'
    );
    const reclaimed = await claimTask(store, taskId, bob, released.task.version);
    const completed = await completeTask(store, taskId, bob, reclaimed.task.version);

    expect([claimed, released, reclaimed, completed].map((result) => result.task.version)).toEqual([2, 3, 4, 5]);
    expect(released.task).toMatchObject({ status: 'available', claimedBy: null, claimedAt: null });
    expect(completed.task).toMatchObject({ status: 'completed', claimedBy: null, claimedAt: null });
    expect(completed.task.completedAt).toEqual(expect.any(Number));
    expect(store.tables.taskEvents.map((event) => event.eventType)).toEqual([
      'task_claimed',
      'task_released',
      'task_claimed',
      'task_completed',
    ]);
  });

  it('reports a stale version without writing anything', async () => {
    const { store, alice, projectId, typeId } = setup();
    const taskId = store.addTask({ projectId, typeId, createdBy: alice });

    await expect(claimTask(store, taskId, alice, 7)).rejects.toHaveProperty('code', 'VERSION_CONFLICT');
    expect(storedTask(store, taskId)).toMatchObject({ status: 'available', version: 1 });
    expect(store.tables.taskEvents).toEqual([]);
  });

  it('guards transitions by state', async () => {
    const { store, alice, projectId, typeId } = setup();
    const available = store.addTask({ projectId, typeId, createdBy: alice });
    const done = store.addTask({ projectId, typeId, createdBy: alice, status: 'completed', completedAt: 1 });

    await expect(completeTask(store, available, alice, 1)).rejects.toHaveProperty('code', 'INVALID_TRANSITION');
    await expect(claimTask(store, done, alice, 1)).rejects.toHaveProperty('code', 'INVALID_TRANSITION');
    await expect(claimTask(store, 9999, alice, 1)).rejects.toHaveProperty('code', 'NOT_FOUND');
  });

  it('feeds a changed card state to card rules with the triggering user', async () => {
    const { store, orgId, alice, projectId, typeId } = setup();
    const cardId = store.addCard({ projectId, createdBy: alice });
    const first = store.addTask({ projectId, typeId, cardId, createdBy: alice });
    store.addTask({ projectId, typeId, cardId, createdBy: alice });
    const workflowId = store.addWorkflow({ orgId, createdBy: alice });
    const ruleId = store.addRule({ workflowId, resourceType: 'card', toState: 'in_progress' });
    const templateId = store.addTemplate({ projectId, typeId, createdBy: alice, name: 'Review card' });
    store.attachTemplate(ruleId, templateId);

    const result = await claimTask(store, first, alice, 1);

    expect(result.executions).toEqual([
      expect.objectContaining({
        ruleId,
        originType: 'card',
        originId: cardId,
        outcome: 'applied',
        userId: alice,
        userEmail: 'alice@example.com',
      }),
    ]);
    expect(result.createdTasks).toEqual([
      expect.objectContaining({ title: 'Review card', cardId, createdBy: alice, createdFromRuleId: ruleId }),
    ]);
  });

  it('does not emit a card event when the derived state stays the same', async () => {
    const { store, orgId, alice, bob, projectId, typeId } = setup();
    const cardId = store.addCard({ projectId, createdBy: alice });
    store.addTask({ projectId, typeId, cardId, createdBy: alice, status: 'claimed', claimedBy: bob, claimedAt: 1 });
    const second = store.addTask({ projectId, typeId, cardId, createdBy: alice });
    const workflowId = store.addWorkflow({ orgId, createdBy: alice });
    store.addRule({ workflowId, resourceType: 'card', toState: 'in_progress' });

    const result = await claimTask(store, second, alice, 1);

    expect(result.executions).toEqual([]);
    expect(store.tables.ruleExecutions).toEqual([]);
  });

  it('completes the active milestone when its last task completes', async () => {
    const { store, alice, projectId, typeId } = setup();
    const milestoneId = store.addMilestone({ projectId, createdBy: alice, state: 'active', activatedAt: 1 });
    const cardId = store.addCard({ projectId, createdBy: alice, milestoneId });
    store.addTask({ projectId, typeId, cardId, createdBy: alice, status: 'completed', completedAt: 1 });
    const last = store.addTask({ projectId, typeId, cardId, createdBy: alice, status: 'claimed', claimedBy: alice });

    const result = await completeTask(store, last, alice, 1);

    expect(result.completedMilestone).toMatchObject({ id: milestoneId, state: 'completed' });
    expect(result.completedMilestone?.completedAt).toEqual(expect.any(Number));
  });

  it('leaves the milestone active while other work is open', async () => {
    const { store, alice, projectId, typeId } = setup();
    const milestoneId = store.addMilestone({ projectId, createdBy: alice, state: 'active', activatedAt: 1 });
    const first = store.addTask({ projectId, typeId, milestoneId, createdBy: alice, status: 'claimed', claimedBy: alice });
    store.addTask({ projectId, typeId, milestoneId, createdBy: alice });

    const result = await completeTask(store, first, alice, 1);

    expect(result.completedMilestone).toBeNull();
    expect(store.tables.milestones[0]).toMatchObject({ id: milestoneId, state: 'active' });
  });
});

describe('editTask', () => {
  const claimedTask = () => {
    const context = setup();
    const taskId = context.store.addTask({
      projectId: context.projectId,
      typeId: context.typeId,
      createdBy: context.alice,
      status: 'claimed',
      claimedBy: context.alice,
      claimedAt: 1,
      description: 'old',
    });
    return { ...context, taskId };
  };

  it('applies the provided fields and leaves absent ones alone', async () => {
    const { store, alice, taskId } = claimedTask();

    const task = await editTask(store, taskId, alice, 1, { title: '  Tidy backlog  ', priority: 5, description: null });

    expect(task).toMatchObject({ title: 'Tidy backlog', priority: 5, description: null, status: 'claimed', version: 2 });
  });

  it('validates title, priority and type', async () => {
    const { store, orgId, alice, taskId } = claimedTask();
    const otherProject = store.addProject(orgId, 'Other');
    const foreignType = store.addTaskType(otherProject);

    await expect(editTask(store, taskId, alice, 1, { title: 'x'.repeat(57) })).rejects.toHaveProperty(
      'code',
      'VALIDATION_ERROR'
    );
    await expect(editTask(store, taskId, alice, 1, { priority: 6 })).rejects.toHaveProperty('code', 'VALIDATION_ERROR');
    await expect(editTask(store, taskId, alice, 1, { typeId: foreignType })).rejects.toHaveProperty(
      'code',
      'VALIDATION_ERROR'
    );
    expect(storedTask(store, taskId)).toMatchObject({ version: 1 });
  });

  it('accepts a title of exactly 56 characters', async () => {
    const { store, alice, taskId } = claimedTask();

    const task = await editTask(store, taskId, alice, 1, { title: 'y'.repeat(56) });

    expect(task.title).toHaveLength(56);
  });

  it('only lets the claimer edit', async () => {
    const { store, bob, taskId } = claimedTask();

    await expect(editTask(store, taskId, bob, 1, { priority: 1 })).rejects.toHaveProperty('code', 'NOT_AUTHORIZED');
  });
});

describe('releaseAllForUser', () => {
  it('releases every task the user holds in the project as a system action', async () => {
    const { store, orgId, alice, bob, projectId, typeId } = setup();
    const held = [
      store.addTask({ projectId, typeId, createdBy: alice, status: 'claimed', claimedBy: alice, claimedAt: 1 }),
      store.addTask({ projectId, typeId, createdBy: alice, status: 'claimed', claimedBy: alice, claimedAt: 1 }),
    ];
    const bobs = store.addTask({ projectId, typeId, createdBy: alice, status: 'claimed', claimedBy: bob, claimedAt: 1 });
    const workflowId = store.addWorkflow({ orgId, createdBy: alice });
    const userOnly = store.addRule({ workflowId, resourceType: 'task', toState: 'available' });
    const anyTrigger = store.addRule({ workflowId, resourceType: 'task', toState: 'available', userTriggeredOnly: false });

    const result = await releaseAllForUser(store, projectId, alice);

    expect(result.released.map((task) => task.id)).toEqual(held);
    expect(result.released.every((task) => task.status === 'available' && task.version === 2)).toBe(true);
    expect(storedTask(store, bobs)).toMatchObject({ status: 'claimed', claimedBy: bob, version: 1 });
    expect(store.tables.taskEvents).toEqual(
      held.map((taskId) => expect.objectContaining({ taskId, eventType: 'task_released', actorUserId: null }))
    );
    expect(result.executions.map((execution) => [execution.ruleId, execution.outcome, execution.suppressionReason])).toEqual([
      [userOnly, 'suppressed', 'not_user_triggered'],
      [anyTrigger, 'applied', null],
      [userOnly, 'suppressed', 'not_user_triggered'],
      [anyTrigger, 'applied', null],
    ]);
  });

  it('reports a missing project', async () => {
    const { store, alice } = setup();

    await expect(releaseAllForUser(store, 9999, alice)).rejects.toHaveProperty('code', 'NOT_FOUND');
  });
});
