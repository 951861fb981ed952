import { sql } from 'drizzle-orm';
import {
  pgTable,
  serial,
  integer,
  text,
  bigint,
  boolean,
  jsonb,
  index,
  uniqueIndex,
  primaryKey,
  check,
} from 'drizzle-orm/pg-core';

export const organizations = pgTable('organizations', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
});

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  orgId: integer('org_id')
    .notNull()
    .references(() => organizations.id),
  email: text('email').notNull().unique(),
});

export const projects = pgTable('projects', {
  id: serial('id').primaryKey(),
  orgId: integer('org_id')
    .notNull()
    .references(() => organizations.id),
  name: text('name').notNull(),
});

export const taskTypes = pgTable('task_types', {
  id: serial('id').primaryKey(),
  projectId: integer('project_id')
    .notNull()
    .references(() => projects.id),
  name: text('name').notNull(),
});

export const milestones = pgTable(
  'milestones',
  {
    id: serial('id').primaryKey(),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id),
    name: text('name').notNull(),
    description: text('description'),
    state: text('state', { enum: ['ready', 'active', 'completed'] })
      .notNull()
      .default('ready'),
    position: integer('position').notNull().default(0),
    createdBy: integer('created_by')
      .notNull()
      .references(() => users.id),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    activatedAt: bigint('activated_at', { mode: 'number' }),
    completedAt: bigint('completed_at', { mode: 'number' }),
  },
  (table) => ({
    projectIdx: index('milestones_project_idx').on(table.projectId),
    oneActive: uniqueIndex('milestones_one_active_idx')
      .on(table.projectId)
      .where(sql`${table.state} = 'active'`),
    stateTimestamps: check(
      'milestones_state_timestamps',
      sql`(${table.state} = 'ready' and ${table.activatedAt} is null and ${table.completedAt} is null)
        or (${table.state} = 'active' and ${table.activatedAt} is not null and ${table.completedAt} is null)
        or (${table.state} = 'completed' and ${table.activatedAt} is not null and ${table.completedAt} is not null)`
    ),
  })
);

export const cards = pgTable(
  'cards',
  {
    id: serial('id').primaryKey(),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id),
    milestoneId: integer('milestone_id').references(() => milestones.id),
    title: text('title').notNull(),
    description: text('description'),
    createdBy: integer('created_by')
      .notNull()
      .references(() => users.id),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    version: integer('version').notNull().default(1),
  },
  (table) => ({
    projectMilestoneIdx: index('cards_project_milestone_idx').on(table.projectId, table.milestoneId),
  })
);

export const workflows = pgTable(
  'workflows',
  {
    id: serial('id').primaryKey(),
    orgId: integer('org_id')
      .notNull()
      .references(() => organizations.id),
    projectId: integer('project_id').references(() => projects.id),
    name: text('name').notNull(),
    active: boolean('active').notNull().default(false),
    createdBy: integer('created_by')
      .notNull()
      .references(() => users.id),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    orgIdx: index('workflows_org_idx').on(table.orgId),
  })
);

export const rules = pgTable(
  'rules',
  {
    id: serial('id').primaryKey(),
    workflowId: integer('workflow_id')
      .notNull()
      .references(() => workflows.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    goal: text('goal'),
    resourceType: text('resource_type', { enum: ['task', 'card'] }).notNull(),
    taskTypeId: integer('task_type_id').references(() => taskTypes.id),
    toState: text('to_state').notNull(),
    active: boolean('active').notNull().default(true),
    userTriggeredOnly: boolean('user_triggered_only').notNull().default(true),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    workflowIdx: index('rules_workflow_idx').on(table.workflowId),
  })
);

export const taskTemplates = pgTable(
  'task_templates',
  {
    id: serial('id').primaryKey(),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id),
    name: text('name').notNull(),
    description: text('description'),
    typeId: integer('type_id')
      .notNull()
      .references(() => taskTypes.id),
    priority: integer('priority').notNull().default(3),
    createdBy: integer('created_by')
      .notNull()
      .references(() => users.id),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    priorityRange: check('task_templates_priority_range', sql`${table.priority} between 1 and 5`),
  })
);

export const ruleTemplates = pgTable(
  'rule_templates',
  {
    ruleId: integer('rule_id')
      .notNull()
      .references(() => rules.id, { onDelete: 'cascade' }),
    templateId: integer('template_id')
      .notNull()
      .references(() => taskTemplates.id, { onDelete: 'cascade' }),
    executionOrder: integer('execution_order').notNull().default(0),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.ruleId, table.templateId] }),
  })
);

export const tasks = pgTable(
  'tasks',
  {
    id: serial('id').primaryKey(),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id),
    typeId: integer('type_id')
      .notNull()
      .references(() => taskTypes.id),
    cardId: integer('card_id').references(() => cards.id),
    milestoneId: integer('milestone_id').references(() => milestones.id),
    title: text('title').notNull(),
    description: text('description'),
    priority: integer('priority').notNull().default(3),
    status: text('status', { enum: ['available', 'claimed', 'completed'] })
      .notNull()
      .default('available'),
    claimedBy: integer('claimed_by').references(() => users.id),
    claimedAt: bigint('claimed_at', { mode: 'number' }),
    completedAt: bigint('completed_at', { mode: 'number' }),
    createdBy: integer('created_by')
      .notNull()
      .references(() => users.id),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    createdFromRuleId: integer('created_from_rule_id').references(() => rules.id, { onDelete: 'set null' }),
    version: integer('version').notNull().default(1),
  },
  (table) => ({
    projectStatusIdx: index('tasks_project_status_idx').on(table.projectId, table.status),
    cardIdx: index('tasks_card_idx').on(table.cardId),
    claimedByIdx: index('tasks_claimed_by_idx').on(table.claimedBy),
    titleLength: check('tasks_title_max_56', sql`char_length(${table.title}) <= 56`),
    priorityRange: check('tasks_priority_range', sql`${table.priority} between 1 and 5`),
    // A task sits in a milestone through its card or directly, never both.
    milestoneExclusive: check('tasks_milestone_exclusive', sql`${table.cardId} is null or ${table.milestoneId} is null`),
  })
);

export const ruleExecutions = pgTable(
  'rule_executions',
  {
    id: serial('id').primaryKey(),
    ruleId: integer('rule_id')
      .notNull()
      .references(() => rules.id, { onDelete: 'cascade' }),
    originType: text('origin_type', { enum: ['task', 'card'] }).notNull(),
    originId: integer('origin_id').notNull(),
    outcome: text('outcome', { enum: ['applied', 'suppressed'] }).notNull(),
    suppressionReason: text('suppression_reason', {
      enum: ['idempotent', 'not_user_triggered', 'not_matching', 'inactive'],
    }),
    userId: integer('user_id').references(() => users.id),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    ruleCreatedIdx: index('rule_executions_rule_created_idx').on(table.ruleId, table.createdAt),
    originIdx: index('rule_executions_origin_idx').on(table.originType, table.originId),
    oneApplied: uniqueIndex('rule_executions_one_applied_idx')
      .on(table.ruleId, table.originType, table.originId)
      .where(sql`${table.outcome} = 'applied'`),
  })
);

export const taskEvents = pgTable(
  'task_events',
  {
    id: serial('id').primaryKey(),
    orgId: integer('org_id')
      .notNull()
      .references(() => organizations.id),
    projectId: integer('project_id')
      .notNull()
      .references(() => projects.id),
    taskId: integer('task_id')
      .notNull()
      .references(() => tasks.id),
    actorUserId: integer('actor_user_id').references(() => users.id),
    eventType: text('event_type', { enum: ['task_claimed', 'task_released', 'task_completed'] }).notNull(),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
  },
  (table) => ({
    taskCreatedIdx: index('task_events_task_created_idx').on(table.taskId, table.createdAt),
  })
);

export const observabilityLogs = pgTable('observability_logs', {
  id: serial('id').primaryKey(),
  kind: text('kind').notNull(),
  payload: jsonb('payload').notNull().$type<Record<string, unknown>>(),
  createdAt: bigint('created_at', { mode: 'number' }).notNull(),
});
