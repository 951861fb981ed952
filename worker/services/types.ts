export type TaskStatus = 'available' | 'claimed' | 'completed';
export type CardState = 'pending' | 'in_progress' | 'closed';
export type MilestoneState = 'ready' | 'active' | 'completed';
export type ResourceType = 'task' | 'card';

export type TaskRecord = {
  id: number;
  projectId: number;
  typeId: number;
  cardId: number | null;
  milestoneId: number | null;
  title: string;
  description: string | null;
  priority: number;
  status: TaskStatus;
  claimedBy: number | null;
  claimedAt: number | null;
  completedAt: number | null;
  createdBy: number;
  createdAt: number;
  createdFromRuleId: number | null;
  version: number;
};

export type CardRecord = {
  id: number;
  projectId: number;
  milestoneId: number | null;
  title: string;
  description: string | null;
  createdBy: number;
  createdAt: number;
  version: number;
  taskCount: number;
  claimedCount: number;
  completedCount: number;
  state: CardState;
};

export type MilestoneRecord = {
  id: number;
  projectId: number;
  name: string;
  description: string | null;
  state: MilestoneState;
  position: number;
  createdBy: number;
  createdAt: number;
  activatedAt: number | null;
  completedAt: number | null;
};

export type ProjectRecord = {
  id: number;
  orgId: number;
  name: string;
};

export type WorkflowRecord = {
  id: number;
  orgId: number;
  projectId: number | null;
  name: string;
  active: boolean;
  createdBy: number;
  createdAt: number;
};

export type RuleTarget =
  | { resourceType: 'task'; taskTypeId?: number; toState: TaskStatus }
  | { resourceType: 'card'; toState: CardState };

export type RuleRecord = {
  id: number;
  workflowId: number;
  name: string;
  goal: string | null;
  target: RuleTarget;
  active: boolean;
  userTriggeredOnly: boolean;
  createdAt: number;
};

/** A rule together with the workflow that owns it, as loaded for evaluation. */
export type ScopedRule = {
  rule: RuleRecord;
  workflow: WorkflowRecord;
};

export type TaskTemplateRecord = {
  id: number;
  projectId: number;
  name: string;
  description: string | null;
  typeId: number;
  priority: number;
  createdBy: number;
  createdAt: number;
};

export type AttachedTemplate = TaskTemplateRecord & { executionOrder: number };

export type SuppressionReason = 'idempotent' | 'not_user_triggered' | 'not_matching' | 'inactive';

export type ExecutionOutcome =
  | { outcome: 'applied'; suppressionReason: null }
  | { outcome: 'suppressed'; suppressionReason: SuppressionReason };

export type RuleExecutionRecord = ExecutionOutcome & {
  id: number;
  ruleId: number;
  originType: ResourceType;
  originId: number;
  userId: number | null;
  userEmail: string | null;
  createdAt: number;
};

export type TaskTransitionEvent = {
  resourceType: 'task';
  resourceId: number;
  orgId: number;
  projectId: number;
  cardId?: number;
  taskTypeId?: number;
  toState: TaskStatus;
  triggeredBy?: number;
};

export type CardTransitionEvent = {
  resourceType: 'card';
  resourceId: number;
  orgId: number;
  projectId: number;
  toState: CardState;
  triggeredBy?: number;
};

export type TransitionEvent = TaskTransitionEvent | CardTransitionEvent;

export type TaskEventType = 'task_claimed' | 'task_released' | 'task_completed';

export type TimeWindow = {
  from: number;
  to: number;
};

export type ExecutionCounts = {
  evaluated: number;
  applied: number;
  suppressed: number;
};

export type SuppressionBreakdown = Record<SuppressionReason, number>;

export type RuleMetrics = ExecutionCounts & {
  ruleId: number;
  ruleName: string;
  suppressedBy: SuppressionBreakdown;
};

export type WorkflowMetrics = ExecutionCounts & {
  workflowId: number;
  workflowName: string;
  projectId: number | null;
  ruleCount: number;
};
