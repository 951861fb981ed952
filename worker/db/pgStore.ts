import { and, asc, count, desc, eq, exists, gte, isNull, lte, ne, notExists, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { DatabaseError } from 'pg';
import * as schema from './schema';
import {
  cards,
  milestones,
  observabilityLogs,
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

/** A Drizzle database or an open transaction on it; both expose the same query builder. */
type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const ONE_ACTIVE_MILESTONE_INDEX = 'milestones_one_active_idx';

const isUniqueViolation = (error: unknown, constraint: string): boolean => {
  if (error instanceof DatabaseError) return error.code === '23505' && error.constraint === constraint;
  if (error instanceof Error && error.cause !== undefined) return isUniqueViolation(error.cause, constraint);
  return false;
};

const taskGuard = (mutation: TaskMutation): SQL | undefined => {
  if (mutation.kind === 'claim') return eq(tasks.status, 'available');
  return and(eq(tasks.status, 'claimed'), eq(tasks.claimedBy, mutation.actorId));
};

const taskChanges = (mutation: TaskMutation): Partial<typeof tasks.$inferInsert> => {
  switch (mutation.kind) {
    case 'claim':
      return { status: 'claimed', claimedBy: mutation.actorId, claimedAt: mutation.at };
    case 'release':
      return { status: 'available', claimedBy: null, claimedAt: null };
    case 'complete':
      return { status: 'completed', claimedBy: null, claimedAt: null, completedAt: mutation.at };
    case 'edit':
      return {
        ...(mutation.title !== undefined && { title: mutation.title }),
        ...(mutation.description !== undefined && { description: mutation.description }),
        ...(mutation.priority !== undefined && { priority: mutation.priority }),
        ...(mutation.typeId !== undefined && { typeId: mutation.typeId }),
      };
  }
};

const executionCount = (condition?: SQL) =>
  condition
    ? sql<number>`count(${ruleExecutions.id}) filter (where ${condition})`.mapWith(Number)
    : sql<number>`count(${ruleExecutions.id})`.mapWith(Number);

const executionCounters = {
  evaluated: executionCount(),
  applied: executionCount(eq(ruleExecutions.outcome, 'applied')),
  suppressed: executionCount(eq(ruleExecutions.outcome, 'suppressed')),
};

const executionsInWindow = (window: TimeWindow) =>
  and(
    eq(ruleExecutions.ruleId, rules.id),
    gte(ruleExecutions.createdAt, window.from),
    lte(ruleExecutions.createdAt, window.to)
  );

export class PgTrackerStore implements TrackerStore {
  constructor(private readonly db: Executor) {}

  async transaction<T>(work: (tx: TrackerTx) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new PgTrackerStore(tx)));
  }

  async savepoint<T>(work: (tx: TrackerTx) => Promise<T>): Promise<T> {
    // A transaction opened on a transaction is a savepoint.
    return this.db.transaction((sp) => work(new PgTrackerStore(sp)));
  }

  async getProject(projectId: number, options?: { lock?: boolean }): Promise<ProjectRecord | null> {
    const query = this.db.select().from(projects).where(eq(projects.id, projectId));
    const [row] = options?.lock ? await query.for('update') : await query;
    return row ? { id: row.id, orgId: row.orgId, name: row.name } : null;
  }

  async getUserEmail(userId: number): Promise<string | null> {
    const [row] = await this.db.select({ email: users.email }).from(users).where(eq(users.id, userId));
    return row?.email ?? null;
  }

  async taskTypeBelongsToProject(typeId: number, projectId: number): Promise<boolean> {
    const [row] = await this.db
      .select({ id: taskTypes.id })
      .from(taskTypes)
      .where(and(eq(taskTypes.id, typeId), eq(taskTypes.projectId, projectId)));
    return row !== undefined;
  }

  async getTask(taskId: number): Promise<TaskRecord | null> {
    const [row] = await this.db.select().from(tasks).where(eq(tasks.id, taskId));
    return row ? toTaskRecord(row) : null;
  }

  async updateTaskIfVersion(taskId: number, expectedVersion: number, mutation: TaskMutation): Promise<TaskRecord | null> {
    const [row] = await this.db
      .update(tasks)
      .set({ ...taskChanges(mutation), version: sql`${tasks.version} + 1` })
      .where(and(eq(tasks.id, taskId), eq(tasks.version, expectedVersion), taskGuard(mutation)))
      .returning();
    return row ? toTaskRecord(row) : null;
  }

  async insertTask(task: NewTask): Promise<TaskRecord> {
    const [row] = await this.db.insert(tasks).values(task).returning();
    return toTaskRecord(row);
  }

  async releaseTasksClaimedBy(projectId: number, userId: number): Promise<TaskRecord[]> {
    const rows = await this.db
      .update(tasks)
      .set({ status: 'available', claimedBy: null, claimedAt: null, version: sql`${tasks.version} + 1` })
      .where(and(eq(tasks.projectId, projectId), eq(tasks.claimedBy, userId), eq(tasks.status, 'claimed')))
      .returning();
    return rows.map(toTaskRecord).sort((a, b) => a.id - b.id);
  }

  async insertTaskEvent(event: NewTaskEvent): Promise<void> {
    await this.db.insert(taskEvents).values(event);
  }

  async getCard(cardId: number): Promise<CardRecord | null> {
    const [row] = await this.db
      .select({
        card: cards,
        taskCount: sql<number>`count(${tasks.id})`.mapWith(Number),
        claimedCount: sql<number>`count(${tasks.id}) filter (where ${tasks.status} = 'claimed')`.mapWith(Number),
        completedCount: sql<number>`count(${tasks.id}) filter (where ${tasks.status} = 'completed')`.mapWith(Number),
      })
      .from(cards)
      .leftJoin(tasks, eq(tasks.cardId, cards.id))
      .where(eq(cards.id, cardId))
      .groupBy(cards.id);
    return row ? toCardRecord(row.card, row) : null;
  }

  async updateCardIfVersion(cardId: number, expectedVersion: number, patch: CardPatch): Promise<CardRecord | null> {
    const [row] = await this.db
      .update(cards)
      .set({
        ...(patch.title !== undefined && { title: patch.title }),
        ...(patch.milestoneId !== undefined && { milestoneId: patch.milestoneId }),
        version: sql`${cards.version} + 1`,
      })
      .where(and(eq(cards.id, cardId), eq(cards.version, expectedVersion)))
      .returning({ id: cards.id });
    return row ? this.getCard(row.id) : null;
  }

  async getMilestone(milestoneId: number): Promise<MilestoneRecord | null> {
    const [row] = await this.db.select().from(milestones).where(eq(milestones.id, milestoneId));
    return row ? toMilestoneRecord(row) : null;
  }

  async findActiveMilestone(projectId: number, excludeId?: number): Promise<MilestoneRecord | null> {
    const [row] = await this.db
      .select()
      .from(milestones)
      .where(
        and(
          eq(milestones.projectId, projectId),
          eq(milestones.state, 'active'),
          excludeId === undefined ? undefined : ne(milestones.id, excludeId)
        )
      )
      .limit(1);
    return row ? toMilestoneRecord(row) : null;
  }

  async activateMilestone(milestoneId: number, projectId: number, at: number): Promise<MilestoneRecord | null> {
    const sibling = alias(milestones, 'sibling');
    try {
      const [row] = await this.db.transaction((sp) =>
        sp
          .update(milestones)
          .set({ state: 'active', activatedAt: at })
          .where(
            and(
              eq(milestones.id, milestoneId),
              eq(milestones.projectId, projectId),
              eq(milestones.state, 'ready'),
              notExists(
                sp
                  .select({ id: sibling.id })
                  .from(sibling)
                  .where(and(eq(sibling.projectId, projectId), eq(sibling.state, 'active')))
              )
            )
          )
          .returning()
      );
      return row ? toMilestoneRecord(row) : null;
    } catch (error) {
      // A concurrent activation committed between our check and our write.
      if (isUniqueViolation(error, ONE_ACTIVE_MILESTONE_INDEX)) return null;
      throw error;
    }
  }

  async countMilestoneContent(milestoneId: number): Promise<MilestoneContentCounts> {
    const [cardRow] = await this.db.select({ value: count() }).from(cards).where(eq(cards.milestoneId, milestoneId));
    const [taskRow] = await this.db
      .select({ value: count() })
      .from(tasks)
      .leftJoin(cards, eq(cards.id, tasks.cardId))
      .where(sql`coalesce(${tasks.milestoneId}, ${cards.milestoneId}) = ${milestoneId}`);
    return { cards: cardRow?.value ?? 0, tasks: taskRow?.value ?? 0 };
  }

  async completeMilestoneIfDone(milestoneId: number, at: number): Promise<MilestoneRecord | null> {
    const hasContent = or(
      exists(this.db.select({ id: cards.id }).from(cards).where(eq(cards.milestoneId, milestoneId))),
      exists(this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.milestoneId, milestoneId)))
    );
    const hasOpenTask = exists(
      this.db
        .select({ id: tasks.id })
        .from(tasks)
        .leftJoin(cards, eq(cards.id, tasks.cardId))
        .where(
          and(
            sql`coalesce(${tasks.milestoneId}, ${cards.milestoneId}) = ${milestoneId}`,
            ne(tasks.status, 'completed')
          )
        )
    );
    const hasEmptyCard = exists(
      this.db
        .select({ id: cards.id })
        .from(cards)
        .where(
          and(
            eq(cards.milestoneId, milestoneId),
            notExists(this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.cardId, cards.id)))
          )
        )
    );
    const [row] = await this.db
      .update(milestones)
      .set({ state: 'completed', completedAt: at })
      .where(
        and(
          eq(milestones.id, milestoneId),
          eq(milestones.state, 'active'),
          hasContent,
          sql`not ${hasOpenTask}`,
          sql`not ${hasEmptyCard}`
        )
      )
      .returning();
    return row ? toMilestoneRecord(row) : null;
  }

  async findMatchingRules(query: RuleQuery): Promise<ScopedRule[]> {
    const taskTypeFilter =
      query.resourceType === 'task' && query.taskTypeId !== undefined
        ? or(isNull(rules.taskTypeId), eq(rules.taskTypeId, query.taskTypeId))
        : undefined;
    const rows = await this.db
      .select({ rule: rules, workflow: workflows })
      .from(rules)
      .innerJoin(workflows, eq(workflows.id, rules.workflowId))
      .where(
        and(
          eq(rules.active, true),
          eq(workflows.active, true),
          eq(rules.resourceType, query.resourceType),
          eq(rules.toState, query.toState),
          eq(workflows.orgId, query.orgId),
          or(isNull(workflows.projectId), eq(workflows.projectId, query.projectId)),
          taskTypeFilter
        )
      )
      .orderBy(sql`${workflows.projectId} nulls last`, asc(rules.id));
    return rows.flatMap((row) => {
      const rule = toRuleRecord(row.rule);
      return rule ? [{ rule, workflow: toWorkflowRecord(row.workflow) }] : [];
    });
  }

  async getScopedRule(ruleId: number): Promise<ScopedRule | null> {
    const [row] = await this.db
      .select({ rule: rules, workflow: workflows })
      .from(rules)
      .innerJoin(workflows, eq(workflows.id, rules.workflowId))
      .where(eq(rules.id, ruleId))
      .for('share');
    if (!row) return null;
    const rule = toRuleRecord(row.rule);
    return rule ? { rule, workflow: toWorkflowRecord(row.workflow) } : null;
  }

  async listRuleTemplates(ruleId: number): Promise<AttachedTemplate[]> {
    const rows = await this.db
      .select({ template: taskTemplates, executionOrder: ruleTemplates.executionOrder })
      .from(ruleTemplates)
      .innerJoin(taskTemplates, eq(taskTemplates.id, ruleTemplates.templateId))
      .where(eq(ruleTemplates.ruleId, ruleId))
      .orderBy(asc(ruleTemplates.executionOrder), asc(taskTemplates.id));
    return rows.map((row) => ({ ...toTaskTemplateRecord(row.template), executionOrder: row.executionOrder }));
  }

  async findAppliedExecution(
    ruleId: number,
    originType: ResourceType,
    originId: number
  ): Promise<RuleExecutionRecord | null> {
    const [row] = await this.db
      .select({ execution: ruleExecutions, email: users.email })
      .from(ruleExecutions)
      .leftJoin(users, eq(users.id, ruleExecutions.userId))
      .where(
        and(
          eq(ruleExecutions.ruleId, ruleId),
          eq(ruleExecutions.originType, originType),
          eq(ruleExecutions.originId, originId),
          eq(ruleExecutions.outcome, 'applied')
        )
      )
      .limit(1);
    return row ? toRuleExecutionRecord(row.execution, row.email) : null;
  }

  async insertRuleExecution(execution: NewRuleExecution): Promise<RuleExecutionRecord | null> {
    const [row] = await this.db
      .insert(ruleExecutions)
      .values({
        ruleId: execution.ruleId,
        originType: execution.originType,
        originId: execution.originId,
        outcome: execution.outcome,
        suppressionReason: execution.suppressionReason,
        userId: execution.userId,
        createdAt: execution.createdAt,
      })
      .onConflictDoNothing({
        target: [ruleExecutions.ruleId, ruleExecutions.originType, ruleExecutions.originId],
        where: sql`outcome = 'applied'`,
      })
      .returning();
    if (!row) return null;
    const email = row.userId === null ? null : await this.getUserEmail(row.userId);
    return toRuleExecutionRecord(row, email);
  }

  async getRuleMetrics(ruleId: number, window: TimeWindow): Promise<RuleMetrics | null> {
    const [row] = await this.db
      .select({
        ruleId: rules.id,
        ruleName: rules.name,
        ...executionCounters,
        idempotent: executionCount(eq(ruleExecutions.suppressionReason, 'idempotent')),
        notUserTriggered: executionCount(eq(ruleExecutions.suppressionReason, 'not_user_triggered')),
        notMatching: executionCount(eq(ruleExecutions.suppressionReason, 'not_matching')),
        inactive: executionCount(eq(ruleExecutions.suppressionReason, 'inactive')),
      })
      .from(rules)
      .leftJoin(ruleExecutions, executionsInWindow(window))
      .where(eq(rules.id, ruleId))
      .groupBy(rules.id);
    if (!row) return null;
    return {
      ruleId: row.ruleId,
      ruleName: row.ruleName,
      evaluated: row.evaluated,
      applied: row.applied,
      suppressed: row.suppressed,
      suppressedBy: {
        idempotent: row.idempotent,
        not_user_triggered: row.notUserTriggered,
        not_matching: row.notMatching,
        inactive: row.inactive,
      },
    };
  }

  async getWorkflowMetrics(orgId: number, window: TimeWindow): Promise<WorkflowMetrics[]> {
    const rows = await this.db
      .select({
        workflowId: workflows.id,
        workflowName: workflows.name,
        projectId: workflows.projectId,
        ruleCount: sql<number>`count(distinct ${rules.id})`.mapWith(Number),
        ...executionCounters,
      })
      .from(workflows)
      .leftJoin(rules, eq(rules.workflowId, workflows.id))
      .leftJoin(ruleExecutions, executionsInWindow(window))
      .where(eq(workflows.orgId, orgId))
      .groupBy(workflows.id)
      .orderBy(asc(workflows.name));
    return rows;
  }

  async listRuleExecutions(
    ruleId: number,
    window: TimeWindow,
    page: ExecutionPage
  ): Promise<{ data: RuleExecutionRecord[]; total: number }> {
    const whereClause = and(
      eq(ruleExecutions.ruleId, ruleId),
      gte(ruleExecutions.createdAt, window.from),
      lte(ruleExecutions.createdAt, window.to)
    );
    const [{ total }] = await this.db.select({ total: count() }).from(ruleExecutions).where(whereClause);
    const rows = await this.db
      .select({ execution: ruleExecutions, email: users.email })
      .from(ruleExecutions)
      .leftJoin(users, eq(users.id, ruleExecutions.userId))
      .where(whereClause)
      .orderBy(desc(ruleExecutions.createdAt), desc(ruleExecutions.id))
      .limit(page.limit)
      .offset(page.offset);
    return { data: rows.map((row) => toRuleExecutionRecord(row.execution, row.email)), total };
  }

  async insertObservabilityLog(kind: string, payload: Record<string, unknown>, at: number): Promise<void> {
    await this.db.insert(observabilityLogs).values({ kind, payload, createdAt: at });
  }
}
