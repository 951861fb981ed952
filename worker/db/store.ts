import type {
  AttachedTemplate,
  CardRecord,
  ExecutionOutcome,
  MilestoneRecord,
  ProjectRecord,
  ResourceType,
  RuleExecutionRecord,
  RuleMetrics,
  ScopedRule,
  TaskEventType,
  TaskRecord,
  TaskStatus,
  CardState,
  TimeWindow,
  WorkflowMetrics,
} from '../services/types';

/**
 * Mutations accepted by the versioned task update. Each variant carries its own
 * from-state guard, which the store folds into the same conditional statement as the
 * version check.
 */
export type TaskMutation =
  | { kind: 'claim'; actorId: number; at: number }
  | { kind: 'release'; actorId: number }
  | { kind: 'complete'; actorId: number; at: number }
  | {
      kind: 'edit';
      actorId: number;
      title?: string;
      description?: string | null;
      priority?: number;
      typeId?: number;
    };

export type CardPatch = {
  title?: string;
  milestoneId?: number | null;
};

export type NewTask = {
  projectId: number;
  typeId: number;
  cardId: number | null;
  milestoneId: number | null;
  title: string;
  description: string | null;
  priority: number;
  createdBy: number;
  createdFromRuleId: number | null;
  createdAt: number;
};

export type RuleQuery = {
  orgId: number;
  projectId: number;
  resourceType: ResourceType;
  toState: TaskStatus | CardState;
  taskTypeId?: number;
};

export type NewRuleExecution = ExecutionOutcome & {
  ruleId: number;
  originType: ResourceType;
  originId: number;
  userId: number | null;
  createdAt: number;
};

export type NewTaskEvent = {
  orgId: number;
  projectId: number;
  taskId: number;
  actorUserId: number | null;
  eventType: TaskEventType;
  createdAt: number;
};

export type MilestoneContentCounts = {
  cards: number;
  tasks: number;
};

export type ExecutionPage = {
  limit: number;
  offset: number;
};

/**
 * Persistence operations the core runs inside a transaction. Every method is a single
 * statement (or a single statement plus a lock), so a transaction that fails part-way
 * leaves nothing behind.
 */
export interface TrackerTx {
  getProject(projectId: number, options?: { lock?: boolean }): Promise<ProjectRecord | null>;
  getUserEmail(userId: number): Promise<string | null>;
  taskTypeBelongsToProject(typeId: number, projectId: number): Promise<boolean>;

  getTask(taskId: number): Promise<TaskRecord | null>;
  /** Conditional write: `null` when no row matched id, version and the mutation's guard. */
  updateTaskIfVersion(taskId: number, expectedVersion: number, mutation: TaskMutation): Promise<TaskRecord | null>;
  insertTask(task: NewTask): Promise<TaskRecord>;
  releaseTasksClaimedBy(projectId: number, userId: number): Promise<TaskRecord[]>;
  insertTaskEvent(event: NewTaskEvent): Promise<void>;

  getCard(cardId: number): Promise<CardRecord | null>;
  updateCardIfVersion(cardId: number, expectedVersion: number, patch: CardPatch): Promise<CardRecord | null>;

  getMilestone(milestoneId: number): Promise<MilestoneRecord | null>;
  findActiveMilestone(projectId: number, excludeId?: number): Promise<MilestoneRecord | null>;
  /** Conditional write: `null` unless the milestone is ready and no sibling is active. */
  activateMilestone(milestoneId: number, projectId: number, at: number): Promise<MilestoneRecord | null>;
  countMilestoneContent(milestoneId: number): Promise<MilestoneContentCounts>;
  /** Conditional write: `null` unless the milestone is active and all its content is completed. */
  completeMilestoneIfDone(milestoneId: number, at: number): Promise<MilestoneRecord | null>;

  findMatchingRules(query: RuleQuery): Promise<ScopedRule[]>;
  /** Re-reads a rule and its workflow, holding a share lock until the transaction ends. */
  getScopedRule(ruleId: number): Promise<ScopedRule | null>;
  listRuleTemplates(ruleId: number): Promise<AttachedTemplate[]>;
  findAppliedExecution(ruleId: number, originType: ResourceType, originId: number): Promise<RuleExecutionRecord | null>;
  /** Append-only; `null` when an applied row already exists for the rule and origin. */
  insertRuleExecution(execution: NewRuleExecution): Promise<RuleExecutionRecord | null>;

  /** Runs `work` inside a savepoint: a failure undoes only what `work` wrote. */
  savepoint<T>(work: (tx: TrackerTx) => Promise<T>): Promise<T>;
}

export interface TrackerStore extends TrackerTx {
  transaction<T>(work: (tx: TrackerTx) => Promise<T>): Promise<T>;

  getRuleMetrics(ruleId: number, window: TimeWindow): Promise<RuleMetrics | null>;
  getWorkflowMetrics(orgId: number, window: TimeWindow): Promise<WorkflowMetrics[]>;
  listRuleExecutions(
    ruleId: number,
    window: TimeWindow,
    page: ExecutionPage
  ): Promise<{ data: RuleExecutionRecord[]; total: number }>;

  insertObservabilityLog(kind: string, payload: Record<string, unknown>, at: number): Promise<void>;
}
