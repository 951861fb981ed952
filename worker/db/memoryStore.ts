import {
  toCardRecord,
  toMilestoneRecord,
  toRuleExecutionRecord,
  toRuleRecord,
  toTaskRecord,
  toTaskTemplateRecord,
  toWorkflowRecord,
} from '../services/serializers';
import type {
  cards,
  milestones,
  observabilityLogs,
  organizations,
  projects,
  ruleExecutions,
  rules,
  ruleTemplates,
  taskEvents,
  taskTemplates,
  taskTypes,
  tasks,
  users,
  workflows,
} from './schema';
import type {
  CardPatch,
  ExecutionPage,
  MilestoneContentCounts,
  NewRuleExecution,
  NewTask,
  NewTaskEvent,
  RuleQuery,
  TaskMutation,
  TrackerStore,
  TrackerTx,
} from './store';
import type {
  AttachedTemplate,
  CardRecord,
  MilestoneRecord,
  ProjectRecord,
  ResourceType,
  RuleExecutionRecord,
  RuleMetrics,
  ScopedRule,
  TaskRecord,
  TimeWindow,
  WorkflowMetrics,
} from '../services/types';

type OrganizationRow = typeof organizations.$inferSelect;
type UserRow = typeof users.$inferSelect;
type ProjectRow = typeof projects.$inferSelect;
type TaskTypeRow = typeof taskTypes.$inferSelect;
type MilestoneRow = typeof milestones.$inferSelect;
type CardRow = typeof cards.$inferSelect;
type WorkflowRow = typeof workflows.$inferSelect;
type RuleRow = typeof rules.$inferSelect;
type TemplateRow = typeof taskTemplates.$inferSelect;
type RuleTemplateRow = typeof ruleTemplates.$inferSelect;
type TaskRow = typeof tasks.$inferSelect;
type ExecutionRow = typeof ruleExecutions.$inferSelect;
type TaskEventRow = typeof taskEvents.$inferSelect;
type LogRow = typeof observabilityLogs.$inferSelect;

export type MemoryTables = {
  organizations: OrganizationRow[];
  users: UserRow[];
  projects: ProjectRow[];
  taskTypes: TaskTypeRow[];
  milestones: MilestoneRow[];
  cards: CardRow[];
  workflows: WorkflowRow[];
  rules: RuleRow[];
  taskTemplates: TemplateRow[];
  ruleTemplates: RuleTemplateRow[];
  tasks: TaskRow[];
  ruleExecutions: ExecutionRow[];
  taskEvents: TaskEventRow[];
  observabilityLogs: LogRow[];
};

const emptyTables = (): MemoryTables => ({
  organizations: [],
  users: [],
  projects: [],
  taskTypes: [],
  milestones: [],
  cards: [],
  workflows: [],
  rules: [],
  taskTemplates: [],
  ruleTemplates: [],
  tasks: [],
  ruleExecutions: [],
  taskEvents: [],
  observabilityLogs: [],
});

const SEED_TIME = 1_700_000_000_000;

const inWindow = (row: { createdAt: number }, window: TimeWindow) =>
  row.createdAt >= window.from && row.createdAt <= window.to;

/**
 * MemoryTrackerStore - In-memory TrackerStore for tests.
 *
 * Transactions run one at a time; a failed transaction or savepoint restores the tables
 * it started from. The partial unique indexes on milestones and rule_executions are
 * enforced the way the database enforces them.
 */
export class MemoryTrackerStore implements TrackerStore {
  private data: MemoryTables = emptyTables();
  private nextId = 1;
  private queue: Promise<void> = Promise.resolve();

  get tables(): Readonly<MemoryTables> {
    return this.data;
  }

  // --- seeding -----------------------------------------------------------

  addOrg(name = 'Acme'): number {
    const id = this.allocateId();
    this.data.organizations.push({ id, name });
    return id;
  }

  addUser(orgId: number, email: string): number {
    if (this.data.users.some((user) => user.email === email)) {
      throw new Error(`duplicate key value violates unique constraint "users_email_unique"`);
    }
    const id = this.allocateId();
    this.data.users.push({ id, orgId, email });
    return id;
  }

  addProject(orgId: number, name = 'Project'): number {
    const id = this.allocateId();
    this.data.projects.push({ id, orgId, name });
    return id;
  }

  addTaskType(projectId: number, name = 'Chore'): number {
    const id = this.allocateId();
    this.data.taskTypes.push({ id, projectId, name });
    return id;
  }

  addMilestone(input: Pick<MilestoneRow, 'projectId' | 'createdBy'> & Partial<MilestoneRow>): number {
    const id = this.allocateId();
    const state = input.state ?? 'ready';
    this.data.milestones.push({
      id,
      name: `Milestone ${id}`,
      description: null,
      position: 0,
      createdAt: SEED_TIME,
      activatedAt: state === 'ready' ? null : SEED_TIME,
      completedAt: state === 'completed' ? SEED_TIME : null,
      ...input,
      state,
    });
    return id;
  }

  addCard(input: Pick<CardRow, 'projectId' | 'createdBy'> & Partial<CardRow>): number {
    const id = this.allocateId();
    this.data.cards.push({
      id,
      milestoneId: null,
      title: `Card ${id}`,
      description: null,
      createdAt: SEED_TIME,
      version: 1,
      ...input,
    });
    return id;
  }

  addTask(input: Pick<TaskRow, 'projectId' | 'typeId' | 'createdBy'> & Partial<TaskRow>): number {
    const id = this.allocateId();
    this.data.tasks.push({
      id,
      cardId: null,
      milestoneId: null,
      title: `Task ${id}`,
      description: null,
      priority: 3,
      status: 'available',
      claimedBy: null,
      claimedAt: null,
      completedAt: null,
      createdAt: SEED_TIME,
      createdFromRuleId: null,
      version: 1,
      ...input,
    });
    return id;
  }

  addWorkflow(input: Pick<WorkflowRow, 'orgId' | 'createdBy'> & Partial<WorkflowRow>): number {
    const id = this.allocateId();
    this.data.workflows.push({
      id,
      projectId: null,
      name: `Workflow ${id}`,
      active: true,
      createdAt: SEED_TIME,
      ...input,
    });
    return id;
  }

  addRule(input: Pick<RuleRow, 'workflowId' | 'resourceType' | 'toState'> & Partial<RuleRow>): number {
    const id = this.allocateId();
    this.data.rules.push({
      id,
      name: `Rule ${id}`,
      goal: null,
      taskTypeId: null,
      active: true,
      userTriggeredOnly: true,
      createdAt: SEED_TIME,
      ...input,
    });
    return id;
  }

  addTemplate(input: Pick<TemplateRow, 'projectId' | 'typeId' | 'createdBy'> & Partial<TemplateRow>): number {
    const id = this.allocateId();
    this.data.taskTemplates.push({
      id,
      name: `Template ${id}`,
      description: null,
      priority: 3,
      createdAt: SEED_TIME,
      ...input,
    });
    return id;
  }

  attachTemplate(ruleId: number, templateId: number, executionOrder = 0): void {
    this.data.ruleTemplates.push({ ruleId, templateId, executionOrder });
  }

  // --- transactions ------------------------------------------------------

  async transaction<T>(work: (tx: TrackerTx) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.isolated(work));
    // The queue only orders transactions; each caller observes its own outcome through `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async savepoint<T>(work: (tx: TrackerTx) => Promise<T>): Promise<T> {
    return this.isolated(work);
  }

  private async isolated<T>(work: (tx: TrackerTx) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.data);
    const idMark = this.nextId;
    try {
      return await work(this);
    } catch (error) {
      this.data = snapshot;
      this.nextId = idMark;
      throw error;
    }
  }

  private allocateId(): number {
    return this.nextId++;
  }

  // --- lookups -----------------------------------------------------------

  async getProject(projectId: number): Promise<ProjectRecord | null> {
    const row = this.data.projects.find((project) => project.id === projectId);
    return row ? { id: row.id, orgId: row.orgId, name: row.name } : null;
  }

  async getUserEmail(userId: number): Promise<string | null> {
    return this.data.users.find((user) => user.id === userId)?.email ?? null;
  }

  async taskTypeBelongsToProject(typeId: number, projectId: number): Promise<boolean> {
    return this.data.taskTypes.some((type) => type.id === typeId && type.projectId === projectId);
  }

  // --- tasks -------------------------------------------------------------

  async getTask(taskId: number): Promise<TaskRecord | null> {
    const row = this.data.tasks.find((task) => task.id === taskId);
    return row ? toTaskRecord(row) : null;
  }

  async updateTaskIfVersion(taskId: number, expectedVersion: number, mutation: TaskMutation): Promise<TaskRecord | null> {
    const row = this.data.tasks.find((task) => task.id === taskId);
    if (!row || row.version !== expectedVersion) return null;
    const guardHolds =
      mutation.kind === 'claim'
        ? row.status === 'available'
        : row.status === 'claimed' && row.claimedBy === mutation.actorId;
    if (!guardHolds) return null;

    switch (mutation.kind) {
      case 'claim':
        Object.assign(row, { status: 'claimed', claimedBy: mutation.actorId, claimedAt: mutation.at });
        break;
      case 'release':
        Object.assign(row, { status: 'available', claimedBy: null, claimedAt: null });
        break;
      case 'complete':
        Object.assign(row, { status: 'completed', claimedBy: null, claimedAt: null, completedAt: mutation.at });
        break;
      case 'edit':
        if (mutation.title !== undefined) row.title = mutation.title;
        if (mutation.description !== undefined) row.description = mutation.description;
        if (mutation.priority !== undefined) row.priority = mutation.priority;
        if (mutation.typeId !== undefined) row.typeId = mutation.typeId;
        break;
    }
    row.version += 1;
    return toTaskRecord(row);
  }

  async insertTask(task: NewTask): Promise<TaskRecord> {
    if (!this.data.taskTypes.some((type) => type.id === task.typeId)) {
      throw new Error(`insert or update on table "tasks" violates foreign key constraint "tasks_type_id_task_types_id_fk"`);
    }
    const violated =
      task.title.length > 56
        ? 'tasks_title_max_56'
        : task.priority < 1 || task.priority > 5
          ? 'tasks_priority_range'
          : task.cardId !== null && task.milestoneId !== null
            ? 'tasks_milestone_exclusive'
            : null;
    if (violated) throw new Error(`new row for relation "tasks" violates check constraint "${violated}"`);
    const row: TaskRow = {
      ...task,
      id: this.allocateId(),
      status: 'available',
      claimedBy: null,
      claimedAt: null,
      completedAt: null,
      version: 1,
    };
    this.data.tasks.push(row);
    return toTaskRecord(row);
  }

  async releaseTasksClaimedBy(projectId: number, userId: number): Promise<TaskRecord[]> {
    const released = this.data.tasks.filter(
      (task) => task.projectId === projectId && task.status === 'claimed' && task.claimedBy === userId
    );
    for (const row of released) {
      Object.assign(row, { status: 'available', claimedBy: null, claimedAt: null, version: row.version + 1 });
    }
    return released.map(toTaskRecord).sort((a, b) => a.id - b.id);
  }

  async insertTaskEvent(event: NewTaskEvent): Promise<void> {
    this.data.taskEvents.push({ ...event, id: this.allocateId() });
  }

  // --- cards -------------------------------------------------------------

  async getCard(cardId: number): Promise<CardRecord | null> {
    const row = this.data.cards.find((card) => card.id === cardId);
    if (!row) return null;
    const cardTasks = this.data.tasks.filter((task) => task.cardId === cardId);
    return toCardRecord(row, {
      taskCount: cardTasks.length,
      claimedCount: cardTasks.filter((task) => task.status === 'claimed').length,
      completedCount: cardTasks.filter((task) => task.status === 'completed').length,
    });
  }

  async updateCardIfVersion(cardId: number, expectedVersion: number, patch: CardPatch): Promise<CardRecord | null> {
    const row = this.data.cards.find((card) => card.id === cardId);
    if (!row || row.version !== expectedVersion) return null;
    if (patch.title !== undefined) row.title = patch.title;
    if (patch.milestoneId !== undefined) row.milestoneId = patch.milestoneId;
    row.version += 1;
    return this.getCard(cardId);
  }

  // --- milestones --------------------------------------------------------

  async getMilestone(milestoneId: number): Promise<MilestoneRecord | null> {
    const row = this.data.milestones.find((milestone) => milestone.id === milestoneId);
    return row ? toMilestoneRecord(row) : null;
  }

  async findActiveMilestone(projectId: number, excludeId?: number): Promise<MilestoneRecord | null> {
    const row = this.data.milestones.find(
      (milestone) => milestone.projectId === projectId && milestone.state === 'active' && milestone.id !== excludeId
    );
    return row ? toMilestoneRecord(row) : null;
  }

  async activateMilestone(milestoneId: number, projectId: number, at: number): Promise<MilestoneRecord | null> {
    const row = this.data.milestones.find(
      (milestone) => milestone.id === milestoneId && milestone.projectId === projectId && milestone.state === 'ready'
    );
    if (!row) return null;
    if (this.data.milestones.some((milestone) => milestone.projectId === projectId && milestone.state === 'active')) {
      return null;
    }
    row.state = 'active';
    row.activatedAt = at;
    return toMilestoneRecord(row);
  }

  private effectiveMilestoneId(task: TaskRow): number | null {
    if (task.milestoneId !== null) return task.milestoneId;
    if (task.cardId === null) return null;
    return this.data.cards.find((card) => card.id === task.cardId)?.milestoneId ?? null;
  }

  async countMilestoneContent(milestoneId: number): Promise<MilestoneContentCounts> {
    return {
      cards: this.data.cards.filter((card) => card.milestoneId === milestoneId).length,
      tasks: this.data.tasks.filter((task) => this.effectiveMilestoneId(task) === milestoneId).length,
    };
  }

  async completeMilestoneIfDone(milestoneId: number, at: number): Promise<MilestoneRecord | null> {
    const row = this.data.milestones.find((milestone) => milestone.id === milestoneId && milestone.state === 'active');
    if (!row) return null;
    const milestoneCards = this.data.cards.filter((card) => card.milestoneId === milestoneId);
    const hasContent =
      milestoneCards.length > 0 || this.data.tasks.some((task) => task.milestoneId === milestoneId);
    const hasOpenTask = this.data.tasks.some(
      (task) => this.effectiveMilestoneId(task) === milestoneId && task.status !== 'completed'
    );
    const hasEmptyCard = milestoneCards.some((card) => !this.data.tasks.some((task) => task.cardId === card.id));
    if (!hasContent || hasOpenTask || hasEmptyCard) return null;
    row.state = 'completed';
    row.completedAt = at;
    return toMilestoneRecord(row);
  }

  // --- rules -------------------------------------------------------------

  private scoped(rule: RuleRow): ScopedRule | null {
    const workflow = this.data.workflows.find((candidate) => candidate.id === rule.workflowId);
    const record = toRuleRecord(rule);
    return workflow && record ? { rule: record, workflow: toWorkflowRecord(workflow) } : null;
  }

  async findMatchingRules(query: RuleQuery): Promise<ScopedRule[]> {
    return this.data.rules
      .flatMap((rule) => {
        const scoped = this.scoped(rule);
        return scoped ? [scoped] : [];
      })
      .filter(({ rule, workflow }) => {
        if (!rule.active || !workflow.active) return false;
        if (rule.target.resourceType !== query.resourceType || rule.target.toState !== query.toState) return false;
        if (workflow.orgId !== query.orgId) return false;
        if (workflow.projectId !== null && workflow.projectId !== query.projectId) return false;
        if (rule.target.resourceType === 'task' && query.taskTypeId !== undefined) {
          const filter = rule.target.taskTypeId;
          if (filter !== undefined && filter !== query.taskTypeId) return false;
        }
        return true;
      })
      .sort((a, b) => {
        const scopeOrder = Number(a.workflow.projectId === null) - Number(b.workflow.projectId === null);
        return scopeOrder !== 0 ? scopeOrder : a.rule.id - b.rule.id;
      });
  }

  async getScopedRule(ruleId: number): Promise<ScopedRule | null> {
    const rule = this.data.rules.find((candidate) => candidate.id === ruleId);
    return rule ? this.scoped(rule) : null;
  }

  async listRuleTemplates(ruleId: number): Promise<AttachedTemplate[]> {
    return this.data.ruleTemplates
      .filter((link) => link.ruleId === ruleId)
      .flatMap((link) => {
        const template = this.data.taskTemplates.find((candidate) => candidate.id === link.templateId);
        return template ? [{ ...toTaskTemplateRecord(template), executionOrder: link.executionOrder }] : [];
      })
      .sort((a, b) => a.executionOrder - b.executionOrder || a.id - b.id);
  }

  private toExecution(row: ExecutionRow): RuleExecutionRecord {
    const email = row.userId === null ? null : this.data.users.find((user) => user.id === row.userId)?.email ?? null;
    return toRuleExecutionRecord(row, email);
  }

  async findAppliedExecution(
    ruleId: number,
    originType: ResourceType,
    originId: number
  ): Promise<RuleExecutionRecord | null> {
    const row = this.data.ruleExecutions.find(
      (execution) =>
        execution.ruleId === ruleId &&
        execution.originType === originType &&
        execution.originId === originId &&
        execution.outcome === 'applied'
    );
    return row ? this.toExecution(row) : null;
  }

  async insertRuleExecution(execution: NewRuleExecution): Promise<RuleExecutionRecord | null> {
    if (
      execution.outcome === 'applied' &&
      (await this.findAppliedExecution(execution.ruleId, execution.originType, execution.originId))
    ) {
      return null;
    }
    const row: ExecutionRow = { ...execution, id: this.allocateId() };
    this.data.ruleExecutions.push(row);
    return this.toExecution(row);
  }

  // --- reporting ---------------------------------------------------------

  private executionsFor(ruleIds: number[], window: TimeWindow): ExecutionRow[] {
    return this.data.ruleExecutions.filter((row) => ruleIds.includes(row.ruleId) && inWindow(row, window));
  }

  async getRuleMetrics(ruleId: number, window: TimeWindow): Promise<RuleMetrics | null> {
    const rule = this.data.rules.find((candidate) => candidate.id === ruleId);
    if (!rule) return null;
    const rows = this.executionsFor([ruleId], window);
    const reasonCount = (reason: ExecutionRow['suppressionReason']) =>
      rows.filter((row) => row.suppressionReason === reason).length;
    return {
      ruleId,
      ruleName: rule.name,
      evaluated: rows.length,
      applied: rows.filter((row) => row.outcome === 'applied').length,
      suppressed: rows.filter((row) => row.outcome === 'suppressed').length,
      suppressedBy: {
        idempotent: reasonCount('idempotent'),
        not_user_triggered: reasonCount('not_user_triggered'),
        not_matching: reasonCount('not_matching'),
        inactive: reasonCount('inactive'),
      },
    };
  }

  async getWorkflowMetrics(orgId: number, window: TimeWindow): Promise<WorkflowMetrics[]> {
    return this.data.workflows
      .filter((workflow) => workflow.orgId === orgId)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((workflow) => {
        const ruleIds = this.data.rules.filter((rule) => rule.workflowId === workflow.id).map((rule) => rule.id);
        const rows = this.executionsFor(ruleIds, window);
        return {
          workflowId: workflow.id,
          workflowName: workflow.name,
          projectId: workflow.projectId,
          ruleCount: ruleIds.length,
          evaluated: rows.length,
          applied: rows.filter((row) => row.outcome === 'applied').length,
          suppressed: rows.filter((row) => row.outcome === 'suppressed').length,
        };
      });
  }

  async listRuleExecutions(
    ruleId: number,
    window: TimeWindow,
    page: ExecutionPage
  ): Promise<{ data: RuleExecutionRecord[]; total: number }> {
    const rows = this.executionsFor([ruleId], window).sort((a, b) => b.createdAt - a.createdAt || b.id - a.id);
    return {
      data: rows.slice(page.offset, page.offset + page.limit).map((row) => this.toExecution(row)),
      total: rows.length,
    };
  }

  async insertObservabilityLog(kind: string, payload: Record<string, unknown>, at: number): Promise<void> {
    this.data.observabilityLogs.push({ id: this.allocateId(), kind, payload, createdAt: at });
  }
}
