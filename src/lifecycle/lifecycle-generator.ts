import { BusinessCalendar } from '../calendar/business-calendar.js';
import {
  MS_PER_MINUTE,
  addHours,
  addMinutes,
  clampDate,
  daysBetween,
  maxDate,
  minDate,
  weekday,
  wholeDaysBetween,
} from '../calendar/time.js';
import { BoundedSampler } from '../sampling/bounded-sampler.js';
import type { RandomSource } from '../sampling/random.js';
import type { SamplingSpec } from '../sampling/types.js';
import { DistributionRegistry } from '../registry/distribution-registry.js';
import type { Segment } from '../registry/segment.js';
import { ActivityClock } from './activity-clock.js';
import { departmentProfile, workItemTypeProfile } from './types.js';
import type { LifecycleRecord, SegmentProfiles, WorkItemContext } from './types.js';

export const START_DELAY_FIELD = 'start_delay_hours';
export const COMPLETION_FIELD = 'completion_hours';

const BUILTIN_START_DELAY: SamplingSpec = {
  kind: 'boundedLogNormal', mean: 1.5, std: 0.8, min: 0.5, max: 168,
};
const BUILTIN_COMPLETION: SamplingSpec = {
  kind: 'boundedLogNormal', mean: 2.5, std: 1.0, min: 1, max: 336,
};

const MIN_PROBABILITY = 0.1;
const MAX_PROBABILITY = 0.95;
const START_HOURS_MIN = 0.5;
const START_HOURS_MAX = 168;
const START_AFTER_CREATION_MIN = 5;
const START_BEFORE_COMPLETION_MIN = 30;
const MIN_COMPLETION_SPAN_MIN = START_AFTER_CREATION_MIN + START_BEFORE_COMPLETION_MIN;
const DUE_REANCHOR_DAYS = 3;
const ACCELERATION_HORIZON_DAYS = 30;
const FRIDAY = 5;

/**
 * Completion probability for a work item: department base rate plus the
 * type adjustment, scaled by due-date proximity and creation weekday,
 * clamped to [0.10, 0.95].
 */
export function completionProbability(profiles: SegmentProfiles, ctx: WorkItemContext): number {
  const dept = departmentProfile(profiles, ctx.segment);
  const type = workItemTypeProfile(profiles, ctx.segment);
  let rate = dept.baseCompletionRate + type.completionAdjustment;

  if (ctx.dueDate) {
    const daysUntilDue = wholeDaysBetween(ctx.createdAt, ctx.dueDate);
    if (daysUntilDue <= 0) rate *= 0.5;
    else if (daysUntilDue <= 3) rate *= 1.2;
    else if (daysUntilDue <= 7) rate *= 1.1;
    else if (daysUntilDue > 30) rate *= 0.9;
  }

  const day = weekday(ctx.createdAt);
  if (day === FRIDAY) rate *= 0.85;
  else if (day === 0 || day === 6) rate *= 0.7;

  return Math.max(MIN_PROBABILITY, Math.min(MAX_PROBABILITY, rate));
}

/**
 * Shortens a duration as the due date nears: full `acceleration` on the
 * due day, none from 30 days out.
 */
export function compressForDeadline(hours: number, daysUntilDue: number, acceleration: number): number {
  if (daysUntilDue <= 0) return hours;
  const proximity = 1 - Math.min(1, daysUntilDue / ACCELERATION_HORIZON_DAYS);
  return hours / (1 + (acceleration - 1) * proximity);
}

export interface ReanchorWindow {
  from: Date;
  spanMs: number;
}

/** The last three days before `dueDate`, never earlier than an hour after creation. */
export function reanchorWindow(createdAt: Date, dueDate: Date): ReanchorWindow | undefined {
  const from = maxDate(addHours(createdAt, 1), addHours(dueDate, -24 * DUE_REANCHOR_DAYS));
  const spanMs = dueDate.getTime() - from.getTime();
  return spanMs > 0 ? { from, spanMs } : undefined;
}

export interface LifecycleGeneratorOptions {
  now: Date;
}

/**
 * Produces the lifecycle of one work item: Created, then possibly
 * Started and Completed. Out-of-range values are corrected, never
 * rejected, so every record is internally ordered.
 */
export class LifecycleGenerator {
  private readonly sampler: BoundedSampler;
  private readonly clock: ActivityClock;

  constructor(
    calendar: BusinessCalendar,
    private readonly registry: DistributionRegistry,
    private readonly profiles: SegmentProfiles,
    private readonly rng: RandomSource,
    private readonly options: LifecycleGeneratorOptions
  ) {
    this.sampler = new BoundedSampler(rng);
    this.clock = new ActivityClock(calendar, profiles, rng);
  }

  generate(ctx: WorkItemContext): LifecycleRecord {
    const { createdAt, dueDate } = ctx;
    const { now } = this.options;
    const probability = completionProbability(this.profiles, ctx);

    const open = (): LifecycleRecord => ({
      createdAt,
      ...(dueDate ? { dueDate } : {}),
      completed: false,
      overdue: dueDate !== undefined && now.getTime() > dueDate.getTime(),
      completionProbability: probability,
    });

    if (this.rng.next() >= probability) return open();
    if (now.getTime() - createdAt.getTime() < MIN_COMPLETION_SPAN_MIN * MS_PER_MINUTE) return open();

    const completedAt = this.completionTimestamp(ctx);
    const startedAt = this.startTimestamp(ctx, completedAt);

    return {
      createdAt,
      startedAt,
      completedAt,
      ...(dueDate ? { dueDate } : {}),
      cycleTimeDays: daysBetween(startedAt, completedAt),
      leadTimeDays: daysBetween(createdAt, completedAt),
      completed: true,
      overdue: dueDate !== undefined && completedAt.getTime() > dueDate.getTime(),
      completionProbability: probability,
    };
  }

  private completionTimestamp(ctx: WorkItemContext): Date {
    const { createdAt, dueDate, segment } = ctx;
    const dept = departmentProfile(this.profiles, segment);
    const type = workItemTypeProfile(this.profiles, segment);

    let hours = this.sampler.sample(this.lifecycleSpec(segment, COMPLETION_FIELD, BUILTIN_COMPLETION));
    hours *= dept.durationMultiplier;

    if (dueDate) {
      hours = compressForDeadline(hours, wholeDaysBetween(createdAt, dueDate), type.completionAcceleration);
    }

    let completedAt = addHours(createdAt, hours);

    if (dueDate && completedAt.getTime() > dueDate.getTime()) {
      const window = reanchorWindow(createdAt, dueDate);
      if (window) completedAt = new Date(window.from.getTime() + window.spanMs * this.rng.next());
    }

    completedAt = this.clock.place(completedAt, 'task_completion', type.weekendPauseFactor);

    const lower = addMinutes(createdAt, MIN_COMPLETION_SPAN_MIN);
    const upper =
      dueDate && dueDate.getTime() >= lower.getTime() ? minDate(this.options.now, dueDate) : this.options.now;
    return clampDate(completedAt, lower, upper);
  }

  private startTimestamp(ctx: WorkItemContext, completedAt: Date): Date {
    const { createdAt, segment } = ctx;
    const dept = departmentProfile(this.profiles, segment);
    const type = workItemTypeProfile(this.profiles, segment);

    let hours = this.sampler.sample(this.lifecycleSpec(segment, START_DELAY_FIELD, BUILTIN_START_DELAY));
    hours *= dept.startFactor * type.startFactor;
    hours = Math.max(START_HOURS_MIN, Math.min(START_HOURS_MAX, hours));

    const startedAt = this.clock.placeInWorkHours(addHours(createdAt, hours), type.weekendPauseFactor);
    return clampDate(
      startedAt,
      addMinutes(createdAt, START_AFTER_CREATION_MIN),
      addMinutes(completedAt, -START_BEFORE_COMPLETION_MIN)
    );
  }

  private lifecycleSpec(segment: Segment, field: string, builtin: SamplingSpec): SamplingSpec {
    const resolution = this.registry.explain(segment, field, 'number');
    return resolution.tier === 'default' ? builtin : resolution.spec.sampling;
  }
}
