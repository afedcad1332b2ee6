import { BusinessCalendar } from '../calendar/business-calendar.js';
import { isWeekend, withTimeOfDay } from '../calendar/time.js';
import { randomInt, weightedIndex } from '../sampling/random.js';
import type { RandomSource } from '../sampling/random.js';
import type { Segment } from '../registry/segment.js';
import { departmentProfile, workItemTypeProfile } from './types.js';
import type { ActivityType, SegmentProfiles } from './types.js';

const WORK_HOURS_PROBABILITY = 0.85;
const WEEKEND_HOUR_MIN = 9;
const WEEKEND_HOUR_MAX = 20;

// 9AM-7PM on weekends, 6PM-10PM on weekday evenings
const WEEKEND_OFF_HOURS = Array.from({ length: 24 }, (_, h) => (h >= 9 && h < 20 ? 0.08 : 0.01));
const EVENING_OFF_HOURS = Array.from({ length: 24 }, (_, h) => (h >= 18 && h < 23 ? 0.12 : 0.01));

/**
 * Places activity on the clock: day-level relocation first (weekend
 * pause), time-of-day snapping strictly last.
 */
export class ActivityClock {
  constructor(
    private readonly calendar: BusinessCalendar,
    private readonly profiles: SegmentProfiles,
    private readonly rng: RandomSource
  ) {}

  place(timestamp: Date, activity: ActivityType, weekendPauseFactor: number): Date {
    return this.snapToActivityHours(this.applyWeekendPause(timestamp, weekendPauseFactor), activity);
  }

  /** Same as `place`, but business days only clamp into work hours. */
  placeInWorkHours(timestamp: Date, weekendPauseFactor: number): Date {
    const day = this.applyWeekendPause(timestamp, weekendPauseFactor);
    if (!this.calendar.isBusinessDay(day)) return this.clampWeekendHour(day);
    const { start, end } = this.profiles.workHours;
    const hour = Math.min(Math.max(day.getUTCHours(), start), end - 1);
    return withTimeOfDay(day, hour, randomInt(this.rng, 0, 59), randomInt(this.rng, 0, 59));
  }

  applyWeekendPause(timestamp: Date, weekendPauseFactor: number): Date {
    if (isWeekend(timestamp) && this.rng.next() > weekendPauseFactor) {
      return this.calendar.nextBusinessDay(timestamp);
    }
    return timestamp;
  }

  snapToActivityHours(timestamp: Date, activity: ActivityType): Date {
    if (!this.calendar.isBusinessDay(timestamp)) return this.clampWeekendHour(timestamp);
    return withTimeOfDay(timestamp, this.drawHour(activity), this.drawMinute(), randomInt(this.rng, 0, 59));
  }

  drawHour(activity: ActivityType): number {
    return weightedIndex(this.rng, this.profiles.activities[activity]);
  }

  drawMinute(): number {
    const buckets = this.profiles.minuteBuckets;
    const bucket = buckets[weightedIndex(this.rng, buckets.map((b) => b.weight))];
    return randomInt(this.rng, bucket.from, bucket.to - 1);
  }

  /**
   * Creation-style timestamp on `baseDate`'s day: mostly work hours,
   * otherwise evening or weekend hours, then the weekend pause.
   */
  realisticTimestamp(activity: ActivityType, segment: Segment, baseDate: Date): Date {
    const dept = departmentProfile(this.profiles, segment);
    const type = workItemTypeProfile(this.profiles, segment);
    const { start, end } = this.profiles.workHours;

    let workHoursProbability = WORK_HOURS_PROBABILITY;
    const hour = baseDate.getUTCHours();
    if (isWeekend(baseDate)) {
      workHoursProbability *= 1 - dept.weekendActivity;
    } else if (hour < start || hour >= end) {
      workHoursProbability *= 1 - dept.eveningActivity;
    }

    let timestamp: Date;
    if (this.rng.next() < workHoursProbability) {
      timestamp = withTimeOfDay(baseDate, this.drawHour(activity), this.drawMinute(), randomInt(this.rng, 0, 59));
    } else {
      const weights = isWeekend(baseDate) ? WEEKEND_OFF_HOURS : EVENING_OFF_HOURS;
      timestamp = withTimeOfDay(
        baseDate,
        weightedIndex(this.rng, weights),
        randomInt(this.rng, 0, 59),
        randomInt(this.rng, 0, 59)
      );
    }

    if (!isWeekend(timestamp)) return timestamp;
    const moved = this.applyWeekendPause(timestamp, type.weekendPauseFactor);
    return moved === timestamp ? this.clampWeekendHour(timestamp) : this.snapToActivityHours(moved, activity);
  }

  private clampWeekendHour(timestamp: Date): Date {
    const hour = Math.min(Math.max(timestamp.getUTCHours(), WEEKEND_HOUR_MIN), WEEKEND_HOUR_MAX);
    return withTimeOfDay(timestamp, hour, randomInt(this.rng, 0, 59), randomInt(this.rng, 0, 59));
  }
}
