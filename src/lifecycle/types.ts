import type { Segment } from '../registry/segment.js';

export type ActivityType = 'task_creation' | 'task_completion' | 'meeting_scheduling' | 'email_activity';

export interface DepartmentProfile {
  baseCompletionRate: number;
  startFactor: number;
  durationMultiplier: number;
  weekendActivity: number;
  eveningActivity: number;
  creationVolume: number;
}

/** `minDays`/`maxDays` both null marks the "no due date" bucket. */
export interface DueDateBucket {
  minDays: number | null;
  maxDays: number | null;
  weight: number;
}

export interface WorkItemTypeProfile {
  completionAdjustment: number;
  startFactor: number;
  completionAcceleration: number;
  /** Probability that weekend activity is kept rather than pushed to Monday. */
  weekendPauseFactor: number;
  dailyCreationStdDev: number;
  unassignedRate: number;
  dueDateBuckets: DueDateBucket[];
}

export interface MinuteBucket {
  from: number;
  to: number;
  weight: number;
}

export interface SegmentProfiles {
  departments: Record<string, DepartmentProfile>;
  defaultDepartment: DepartmentProfile;
  workItemTypes: Record<string, WorkItemTypeProfile>;
  defaultWorkItemType: WorkItemTypeProfile;
  activities: Record<ActivityType, number[]>;
  minuteBuckets: MinuteBucket[];
  workHours: { start: number; end: number };
}

export interface WorkItemContext {
  segment: Segment;
  createdAt: Date;
  dueDate?: Date;
}

export interface LifecycleRecord {
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  dueDate?: Date;
  cycleTimeDays?: number;
  leadTimeDays?: number;
  completed: boolean;
  overdue: boolean;
  completionProbability: number;
}

export function departmentProfile(profiles: SegmentProfiles, segment: Segment): DepartmentProfile {
  return profiles.departments[segment.department] ?? profiles.defaultDepartment;
}

export function workItemTypeProfile(profiles: SegmentProfiles, segment: Segment): WorkItemTypeProfile {
  return profiles.workItemTypes[segment.workItemType] ?? profiles.defaultWorkItemType;
}
