import type { LoadWarning } from '@shared/schema';
import type { EntityRegistry } from './entity-registry';
import type { Field, PatientDetails, Site, Surface, TreatmentCalendar } from './types';

/**
 * One patient: the native Site → Phase → Field → Surface tree plus, once
 * reprocessed, the treatment calendar over the same Surface instances.
 */
export class Patient {
  private _calendar: TreatmentCalendar | null = null;
  private readonly _warnings: LoadWarning[];

  constructor(
    readonly id: string,
    readonly path: string,
    readonly sites: readonly Site[],
    readonly details: PatientDetails | null,
    readonly registry: EntityRegistry,
    warnings: readonly LoadWarning[] = [],
  ) {
    this._warnings = [...warnings];
  }

  /** Recoverable findings for this patient, from its build onwards. */
  get warnings(): readonly LoadWarning[] {
    return this._warnings;
  }

  recordWarnings(warnings: readonly LoadWarning[]): void {
    this._warnings.push(...warnings);
  }

  get calendar(): TreatmentCalendar | null {
    return this._calendar;
  }

  /** Native-tree traversal, in site/phase/field order. */
  *fields(): Generator<Field> {
    for (const site of this.sites) {
      for (const phase of site.phases) {
        yield* phase.fields;
      }
    }
  }

  *surfaces(): Generator<Surface> {
    for (const field of this.fields()) {
      yield* field.surfaces;
    }
  }

  /**
   * Stores the calendar and records, for every surface in it, which day and
   * session it landed in. Replaces any earlier calendar.
   */
  attachCalendar(calendar: TreatmentCalendar): void {
    if (calendar.patientId !== this.id) {
      throw new Error(`Calendar for ${calendar.patientId} cannot be attached to ${this.id}`);
    }
    this.registry.clearSessionRefs();
    for (const day of calendar.days) {
      for (const session of day.sessions) {
        for (const surface of session.surfaces) {
          this.registry.attachSessionRef(surface, { date: day.date, sessionIndex: session.index });
        }
      }
    }
    this._calendar = calendar;
  }
}
