import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryTrackerStore } from '../db/memoryStore';
import { evaluateSuppression, onTransition } from './ruleEngine';
import { completeTask, releaseAllForUser } from './taskLifecycle';
import type { ScopedRule, TaskTransitionEvent } from './types';

const setup = () => {
  const store = new MemoryTrackerStore();
  const orgId = store.addOrg();
  const alice = store.addUser(orgId, 'alice@example.com');
  const bob = store.addUser(orgId, 'bob@example.com');
  const projectId = store.addProject(orgId);
  const typeId = store.addTaskType(projectId, 'Bug');
  const workflowId = store.addWorkflow({ orgId, createdBy: bob });
  const claimedTask = () =>
    store.addTask({ projectId, typeId, createdBy: alice, status: 'claimed', claimedBy: alice, claimedAt: 1 });
  return { store, orgId, alice, bob, projectId, typeId, workflowId, claimedTask };
};

const scopedRule = (
  overrides: { rule?: Partial<ScopedRule['rule']>; workflow?: Partial<ScopedRule['workflow']> } = {}
): ScopedRule => ({
  rule: {
    id: 1,
    workflowId: 2,
    name: 'Rule',
    goal: null,
    target: { resourceType: 'task', toState: 'completed' },
    active: true,
    userTriggeredOnly: true,
    createdAt: 0,
    ...overrides.rule,
  },
  workflow: { id: 2, orgId: 3, projectId: null, name: 'Flow', active: true, createdBy: 4, createdAt: 0, ...overrides.workflow },
});

const completion: TaskTransitionEvent = {
  resourceType: 'task',
  resourceId: 10,
  orgId: 3,
  projectId: 5,
  taskTypeId: 6,
  toState: 'completed',
  triggeredBy: 4,
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('evaluateSuppression', () => {
  it('passes a matching rule', () => {
    expect(evaluateSuppression(scopedRule(), completion)).toBeNull();
  });

  it('checks activity before the trigger source', () => {
    const { triggeredBy: _ignored, ...systemEvent } = completion;

    expect(evaluateSuppression(scopedRule({ rule: { active: false } }), systemEvent)).toBe('inactive');
    expect(evaluateSuppression(scopedRule({ workflow: { active: false } }), systemEvent)).toBe('inactive');
    expect(evaluateSuppression(scopedRule(), systemEvent)).toBe('not_user_triggered');
    expect(evaluateSuppression(scopedRule({ rule: { userTriggeredOnly: false } }), systemEvent)).toBeNull();
  });

  it('does not match a type filter against an event without a type', () => {
    const { taskTypeId: _ignored, ...untyped } = completion;
    const filtered = scopedRule({ rule: { target: { resourceType: 'task', taskTypeId: 6, toState: 'completed' } } });

    expect(evaluateSuppression(filtered, untyped)).toBe('not_matching');
    expect(evaluateSuppression(filtered, completion)).toBeNull();
    expect(evaluateSuppression(filtered, { ...completion, taskTypeId: 7 })).toBe('not_matching');
  });

  it('does not match across resource types, states or scopes', () => {
    expect(evaluateSuppression(scopedRule(), { ...completion, toState: 'claimed' })).toBe('not_matching');
    expect(
      evaluateSuppression(scopedRule({ rule: { target: { resourceType: 'card', toState: 'closed' } } }), completion)
    ).toBe('not_matching');
    expect(evaluateSuppression(scopedRule({ workflow: { projectId: 99 } }), completion)).toBe('not_matching');
    expect(evaluateSuppression(scopedRule({ workflow: { orgId: 99 } }), completion)).toBe('not_matching');
  });
});

describe('rule engine', () => {
  it('materializes the attached template once for a matching completion', async () => {
    const { store, alice, typeId, workflowId, projectId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'completed', taskTypeId: typeId });
    const templateId = store.addTemplate({ projectId, typeId, createdBy: alice, name: 'Verify fix', priority: 2 });
    store.attachTemplate(ruleId, templateId);
    const taskId = claimedTask();

    const result = await completeTask(store, taskId, alice, 1);

    expect(result.createdTasks).toEqual([
      expect.objectContaining({
        projectId,
        typeId,
        title: 'Verify fix',
        priority: 2,
        status: 'available',
        createdBy: alice,
        createdFromRuleId: ruleId,
        version: 1,
      }),
    ]);
    expect(store.tables.ruleExecutions).toEqual([
      expect.objectContaining({ ruleId, originType: 'task', originId: taskId, outcome: 'applied', suppressionReason: null }),
    ]);
  });

  it('suppresses a re-delivered event as idempotent without creating tasks', async () => {
    const { store, orgId, alice, typeId, workflowId, projectId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'completed', taskTypeId: typeId });
    store.attachTemplate(ruleId, store.addTemplate({ projectId, typeId, createdBy: alice }));
    const taskId = claimedTask();
    await completeTask(store, taskId, alice, 1);
    const taskCount = store.tables.tasks.length;

    const redelivered = await store.transaction((tx) =>
      onTransition(tx, {
        resourceType: 'task',
        resourceId: taskId,
        orgId,
        projectId,
        taskTypeId: typeId,
        toState: 'completed',
        triggeredBy: alice,
      })
    );

    expect(redelivered.createdTasks).toEqual([]);
    expect(redelivered.executions).toEqual([
      expect.objectContaining({ ruleId, outcome: 'suppressed', suppressionReason: 'idempotent' }),
    ]);
    expect(store.tables.tasks).toHaveLength(taskCount);
    expect(store.tables.ruleExecutions.map((row) => row.outcome)).toEqual(['applied', 'suppressed']);
  });

  it('suppresses as idempotent when another transaction takes the applied slot first', async () => {
    const { store, orgId, alice, typeId, workflowId, projectId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'completed', taskTypeId: typeId });
    store.attachTemplate(ruleId, store.addTemplate({ projectId, typeId, createdBy: alice }));
    const taskId = claimedTask();
    await completeTask(store, taskId, alice, 1);
    const taskCount = store.tables.tasks.length;
    vi.spyOn(store, 'findAppliedExecution').mockResolvedValueOnce(null);

    const redelivered = await store.transaction((tx) =>
      onTransition(tx, {
        resourceType: 'task',
        resourceId: taskId,
        orgId,
        projectId,
        taskTypeId: typeId,
        toState: 'completed',
        triggeredBy: alice,
      })
    );

    expect(redelivered.executions.map((row) => [row.outcome, row.suppressionReason])).toEqual([['suppressed', 'idempotent']]);
    expect(redelivered.createdTasks).toEqual([]);
    expect(store.tables.tasks).toHaveLength(taskCount);
  });

  it('records a rule deactivated after candidate selection as inactive', async () => {
    const { store, alice, workflowId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'completed' });
    const reread = store.getScopedRule.bind(store);
    vi.spyOn(store, 'getScopedRule').mockImplementation(async (id) => {
      const scoped = await reread(id);
      return scoped && { ...scoped, rule: { ...scoped.rule, active: false } };
    });

    const result = await completeTask(store, claimedTask(), alice, 1);

    expect(result.executions).toEqual([
      expect.objectContaining({ ruleId, outcome: 'suppressed', suppressionReason: 'inactive' }),
    ]);
    expect(result.createdTasks).toEqual([]);
  });

  it('skips inactive workflows and workflows of other projects entirely', async () => {
    const { store, orgId, alice, bob, workflowId, claimedTask } = setup();
    store.addRule({ workflowId, resourceType: 'task', toState: 'completed', active: false });
    const paused = store.addWorkflow({ orgId, createdBy: bob, active: false });
    store.addRule({ workflowId: paused, resourceType: 'task', toState: 'completed' });
    const elsewhere = store.addWorkflow({ orgId, createdBy: bob, projectId: store.addProject(orgId, 'Elsewhere') });
    store.addRule({ workflowId: elsewhere, resourceType: 'task', toState: 'completed' });

    const result = await completeTask(store, claimedTask(), alice, 1);

    expect(result.executions).toEqual([]);
    expect(store.tables.ruleExecutions).toEqual([]);
  });

  it('evaluates project-scoped workflows before org-scoped ones', async () => {
    const { store, orgId, alice, bob, projectId, typeId, workflowId, claimedTask } = setup();
    const orgRule = store.addRule({ workflowId, resourceType: 'task', toState: 'completed' });
    store.attachTemplate(orgRule, store.addTemplate({ projectId, typeId, createdBy: bob, name: 'From org' }));
    const projectWorkflow = store.addWorkflow({ orgId, projectId, createdBy: bob });
    const projectRule = store.addRule({ workflowId: projectWorkflow, resourceType: 'task', toState: 'completed' });
    store.attachTemplate(projectRule, store.addTemplate({ projectId, typeId, createdBy: bob, name: 'From project' }));

    const result = await completeTask(store, claimedTask(), alice, 1);

    expect(result.executions.map((execution) => execution.ruleId)).toEqual([projectRule, orgRule]);
    expect(result.createdTasks.map((task) => task.title)).toEqual(['From project', 'From org']);
  });

  it('creates tasks in execution order, ties by template id', async () => {
    const { store, alice, projectId, typeId, workflowId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'completed' });
    const last = store.addTemplate({ projectId, typeId, createdBy: alice, name: 'Third' });
    const first = store.addTemplate({ projectId, typeId, createdBy: alice, name: 'First' });
    const second = store.addTemplate({ projectId, typeId, createdBy: alice, name: 'Second' });
    store.attachTemplate(ruleId, last, 2);
    store.attachTemplate(ruleId, second, 1);
    store.attachTemplate(ruleId, first, 1);

    const result = await completeTask(store, claimedTask(), alice, 1);

    expect(result.createdTasks.map((task) => task.title)).toEqual(['First', 'Second', 'Third']);
  });

  it('falls back to the workflow creator when no user triggered the event', async () => {
    const { store, alice, bob, projectId, typeId, workflowId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'available', userTriggeredOnly: false });
    store.attachTemplate(ruleId, store.addTemplate({ projectId, typeId, createdBy: alice, name: 'Reassign' }));
    claimedTask();

    const result = await releaseAllForUser(store, projectId, alice);

    expect(result.createdTasks).toEqual([expect.objectContaining({ title: 'Reassign', createdBy: bob })]);
    expect(result.executions).toEqual([expect.objectContaining({ outcome: 'applied', userId: null, userEmail: null })]);
  });

  it('rolls back the whole transition when a template cannot be materialized', async () => {
    const { store, alice, projectId, typeId, workflowId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'completed' });
    store.attachTemplate(ruleId, store.addTemplate({ projectId, typeId, createdBy: alice, name: 'Fine' }), 1);
    store.attachTemplate(ruleId, store.addTemplate({ projectId, typeId: 9999, createdBy: alice, name: 'Broken' }), 2);
    const taskId = claimedTask();
    const taskCount = store.tables.tasks.length;
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(completeTask(store, taskId, alice, 1)).rejects.toHaveProperty('code', 'STORAGE_ERROR');

    expect(store.tables.tasks).toHaveLength(taskCount);
    expect(store.tables.tasks.find((row) => row.id === taskId)).toMatchObject({ status: 'claimed', version: 1 });
    expect(store.tables.ruleExecutions).toEqual([]);
    expect(store.tables.taskEvents).toEqual([]);
  });

  it.each([
    ['an overlong name', { name: 'x'.repeat(80) }],
    ['an out-of-range priority', { priority: 9 }],
  ])('rejects a template with %s and rolls the transition back', async (_label, template) => {
    const { store, alice, projectId, typeId, workflowId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'completed' });
    store.attachTemplate(ruleId, store.addTemplate({ projectId, typeId, createdBy: alice, ...template }));
    const taskId = claimedTask();
    const taskCount = store.tables.tasks.length;

    await expect(completeTask(store, taskId, alice, 1)).rejects.toHaveProperty('code', 'VALIDATION_ERROR');

    expect(store.tables.tasks).toHaveLength(taskCount);
    expect(store.tables.tasks.find((row) => row.id === taskId)).toMatchObject({ status: 'claimed', version: 1 });
    expect(store.tables.ruleExecutions).toEqual([]);
  });

  it('commits the transition when a suppressed record cannot be written', async () => {
    const { store, alice, workflowId, projectId, claimedTask } = setup();
    const ruleId = store.addRule({ workflowId, resourceType: 'task', toState: 'available' });
    const taskId = claimedTask();
    const insert = store.insertRuleExecution.bind(store);
    vi.spyOn(store, 'insertRuleExecution').mockImplementation(async (execution) => {
      if (execution.outcome === 'suppressed') throw new Error('rule_executions unavailable');
      return insert(execution);
    });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await releaseAllForUser(store, projectId, alice);

    expect(result.released.map((task) => task.id)).toEqual([taskId]);
    expect(store.tables.tasks.find((row) => row.id === taskId)).toMatchObject({ status: 'available', version: 2 });
    expect(result.recordingFailures).toEqual([
      {
        ruleId,
        originType: 'task',
        originId: taskId,
        reason: 'not_user_triggered',
        message: 'rule_executions unavailable',
      },
    ]);
    expect(store.tables.ruleExecutions).toEqual([]);
    expect(store.tables.observabilityLogs).toEqual([
      expect.objectContaining({ kind: 'rule_execution_record_failure', payload: result.recordingFailures[0] }),
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
