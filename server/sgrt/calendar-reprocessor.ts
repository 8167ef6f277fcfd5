import { differenceInMilliseconds } from 'date-fns';
import { DEFAULT_SGRT_CONFIG, type LoadWarning } from '@shared/schema';
import { ReprocessingError, toWarning } from './errors';
import type { Patient } from './patient';
import { calendarDateKey, isUsableDate } from './time';
import type { DeltaSample, Surface, TreatmentCalendar, TreatmentDay, TreatmentSession } from './types';

export interface CalendarReprocessorOptions {
  sessionGapMinutes?: number;
}

export interface ReprocessResult {
  calendar: TreatmentCalendar;
  /** One ReprocessingError per surface left out for lack of a usable timestamp. */
  warnings: LoadWarning[];
}

interface DatedSurface {
  surface: Surface;
  start: Date;
  end: Date;
}

/**
 * Regroups a patient's surfaces by calendar day and treatment session.
 *
 * Works from the registry only, never from disk. Within a day, a capture taken
 * `sessionGapMinutes` or more after the previous capture opens a new session.
 * Recording end times only extend the session's `endTime`.
 */
export class CalendarReprocessor {
  readonly sessionGapMinutes: number;

  constructor(options: CalendarReprocessorOptions = {}) {
    const gap = options.sessionGapMinutes ?? DEFAULT_SGRT_CONFIG.sessionGapMinutes;
    if (!(gap > 0) || !Number.isFinite(gap)) {
      throw new RangeError(`sessionGapMinutes must be a positive number, got ${gap}`);
    }
    this.sessionGapMinutes = gap;
  }

  reprocess(patient: Patient): ReprocessResult {
    const dated: DatedSurface[] = [];
    const skipped: Surface[] = [];
    const warnings: LoadWarning[] = [];

    for (const surface of patient.registry) {
      if (!isUsableDate(surface.capturedAt)) {
        skipped.push(surface);
        const error = new ReprocessingError('Surface has no usable timestamp; left out of the calendar', surface.path);
        warnings.push(toWarning(error, { ...surface.owner }));
        continue;
      }
      const start = surface.capturedAt;
      const end = isUsableDate(surface.endedAt) && surface.endedAt.getTime() > start.getTime() ? surface.endedAt : start;
      dated.push({ surface, start, end });
    }

    // Array.prototype.sort is stable, so equal timestamps keep registry order
    dated.sort((a, b) => a.start.getTime() - b.start.getTime());

    const byDate = new Map<string, DatedSurface[]>();
    for (const entry of dated) {
      const key = calendarDateKey(entry.start);
      const bucket = byDate.get(key);
      if (bucket) bucket.push(entry);
      else byDate.set(key, [entry]);
    }

    const days: TreatmentDay[] = [...byDate.keys()]
      .sort()
      .map(date => ({ date, sessions: this.partitionDay(byDate.get(date) ?? []) }));

    return {
      calendar: {
        patientId: patient.id,
        sessionGapMinutes: this.sessionGapMinutes,
        days,
        skipped,
      },
      warnings,
    };
  }

  private partitionDay(entries: DatedSurface[]): TreatmentSession[] {
    const gapMs = this.sessionGapMinutes * 60_000;
    const groups: DatedSurface[][] = [];
    let current: DatedSurface[] = [];

    for (const entry of entries) {
      const previous = current[current.length - 1];
      if (previous && differenceInMilliseconds(entry.start, previous.start) >= gapMs) {
        groups.push(current);
        current = [];
      }
      current.push(entry);
    }
    if (current.length > 0) groups.push(current);

    return groups.map((members, index) => ({
      index,
      startTime: members[0].start,
      endTime: members.reduce((end, m) => (m.end.getTime() > end.getTime() ? m.end : end), members[0].end),
      captureCount: members.length,
      surfaces: members.map(m => m.surface),
    }));
  }
}

export interface TimelinePoint {
  surfaceId: number;
  sample: DeltaSample;
  /** Minutes since the session's start time. */
  elapsedMinutes: number;
}

/**
 * Every delta sample of a session on one clock, ordered by clock time. Samples
 * without a clock time are left out.
 */
export function sessionTimeline(session: TreatmentSession): TimelinePoint[] {
  const points: TimelinePoint[] = [];
  for (const surface of session.surfaces) {
    for (const recording of surface.recordings) {
      for (const sample of recording.samples) {
        if (!sample.clockTime) continue;
        points.push({
          surfaceId: surface.id,
          sample,
          elapsedMinutes: differenceInMilliseconds(sample.clockTime, session.startTime) / 60_000,
        });
      }
    }
  }
  return points.sort((a, b) => a.elapsedMinutes - b.elapsedMinutes);
}
