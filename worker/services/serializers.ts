import { z } from 'zod';
import type {
  cards,
  milestones,
  ruleExecutions,
  rules,
  taskTemplates,
  tasks,
  workflows,
} from '../db/schema';
import type {
  CardRecord,
  CardState,
  MilestoneRecord,
  RuleExecutionRecord,
  RuleRecord,
  RuleTarget,
  TaskRecord,
  TaskTemplateRecord,
  WorkflowRecord,
} from './types';

type TaskRow = typeof tasks.$inferSelect;
type CardRow = typeof cards.$inferSelect;
type MilestoneRow = typeof milestones.$inferSelect;
type WorkflowRow = typeof workflows.$inferSelect;
type RuleRow = typeof rules.$inferSelect;
type TemplateRow = typeof taskTemplates.$inferSelect;
type ExecutionRow = typeof ruleExecutions.$inferSelect;

export type CardCounts = {
  taskCount: number;
  claimedCount: number;
  completedCount: number;
};

export const deriveCardState = ({ taskCount, claimedCount, completedCount }: CardCounts): CardState => {
  if (taskCount > 0 && completedCount === taskCount) return 'closed';
  if (claimedCount > 0 || completedCount > 0) return 'in_progress';
  return 'pending';
};

export const toTaskRecord = (row: TaskRow): TaskRecord => ({
  id: row.id,
  projectId: row.projectId,
  typeId: row.typeId,
  cardId: row.cardId,
  milestoneId: row.milestoneId,
  title: row.title,
  description: row.description,
  priority: row.priority,
  status: row.status,
  claimedBy: row.claimedBy,
  claimedAt: row.claimedAt,
  completedAt: row.completedAt,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
  createdFromRuleId: row.createdFromRuleId,
  version: row.version,
});

export const toCardRecord = (row: CardRow, counts: CardCounts): CardRecord => ({
  id: row.id,
  projectId: row.projectId,
  milestoneId: row.milestoneId,
  title: row.title,
  description: row.description,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
  version: row.version,
  taskCount: counts.taskCount,
  claimedCount: counts.claimedCount,
  completedCount: counts.completedCount,
  state: deriveCardState(counts),
});

export const toMilestoneRecord = (row: MilestoneRow): MilestoneRecord => ({
  id: row.id,
  projectId: row.projectId,
  name: row.name,
  description: row.description,
  state: row.state,
  position: row.position,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
  activatedAt: row.activatedAt,
  completedAt: row.completedAt,
});

export const toWorkflowRecord = (row: WorkflowRow): WorkflowRecord => ({
  id: row.id,
  orgId: row.orgId,
  projectId: row.projectId,
  name: row.name,
  active: row.active,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
});

const ruleTargetSchema = z.discriminatedUnion('resourceType', [
  z.object({
    resourceType: z.literal('task'),
    taskTypeId: z
      .number()
      .int()
      .nullable()
      .transform((value) => value ?? undefined),
    toState: z.enum(['available', 'claimed', 'completed']),
  }),
  z.object({
    resourceType: z.literal('card'),
    toState: z.enum(['pending', 'in_progress', 'closed']),
  }),
]);

/** Returns null when the stored to_state is not a state of the stored resource type. */
export const toRuleTarget = (row: Pick<RuleRow, 'resourceType' | 'taskTypeId' | 'toState'>): RuleTarget | null => {
  const parsed = ruleTargetSchema.safeParse(row);
  return parsed.success ? parsed.data : null;
};

export const toRuleRecord = (row: RuleRow): RuleRecord | null => {
  const target = toRuleTarget(row);
  if (!target) return null;
  return {
    id: row.id,
    workflowId: row.workflowId,
    name: row.name,
    goal: row.goal,
    target,
    active: row.active,
    userTriggeredOnly: row.userTriggeredOnly,
    createdAt: row.createdAt,
  };
};

export const toTaskTemplateRecord = (row: TemplateRow): TaskTemplateRecord => ({
  id: row.id,
  projectId: row.projectId,
  name: row.name,
  description: row.description,
  typeId: row.typeId,
  priority: row.priority,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
});

export const toRuleExecutionRecord = (row: ExecutionRow, userEmail: string | null): RuleExecutionRecord => {
  const base = {
    id: row.id,
    ruleId: row.ruleId,
    originType: row.originType,
    originId: row.originId,
    userId: row.userId,
    userEmail,
    createdAt: row.createdAt,
  };
  if (row.outcome === 'applied') {
    return { ...base, outcome: 'applied', suppressionReason: null };
  }
  // Suppressed rows always carry a reason; a missing one is reported as not_matching.
  return { ...base, outcome: 'suppressed', suppressionReason: row.suppressionReason ?? 'not_matching' };
};
