import { addDays, isWeekend, startOfDay } from '../calendar/time.js';
import { normal } from '../sampling/random.js';
import type { RandomSource } from '../sampling/random.js';
import type { Segment } from '../registry/segment.js';
import { departmentProfile, workItemTypeProfile } from './types.js';
import type { SegmentProfiles } from './types.js';

export interface SeriesPoint {
  date: Date;
  value: number;
}

const BASE_DAILY_CREATIONS = 5;

/**
 * Expected task creations per day for a segment: a normal draw around 5
 * with the type's spread, floored at zero, damped on weekends by the
 * type's pause factor and scaled by department volume.
 */
export function dailyCreationSeries(
  rng: RandomSource,
  profiles: SegmentProfiles,
  segment: Segment,
  start: Date,
  end: Date
): SeriesPoint[] {
  const dept = departmentProfile(profiles, segment);
  const type = workItemTypeProfile(profiles, segment);
  const series: SeriesPoint[] = [];

  for (let day = startOfDay(start); day.getTime() <= end.getTime(); day = addDays(day, 1)) {
    let value = Math.max(0, normal(rng, BASE_DAILY_CREATIONS, type.dailyCreationStdDev));
    if (isWeekend(day)) value *= type.weekendPauseFactor;
    value *= dept.creationVolume;
    series.push({ date: day, value });
  }
  return series;
}
