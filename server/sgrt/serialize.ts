import type { Patient } from './patient';
import type { SessionRef, Surface, SurfaceFlags, TreatmentCalendar } from './types';

// JSON views of the model. Surfaces appear once, in full, under their Field;
// the calendar refers to them by id.

export interface SurfaceSummary {
  id: number;
  label: string;
  capturedAt: string | null;
  endedAt: string | null;
  recordingCount: number;
  sampleCount: number;
  flags: SurfaceFlags;
  session: SessionRef | null;
}

const iso = (date: Date | null): string | null => (date ? date.toISOString() : null);

export function summarizeSurface(patient: Patient, surface: Surface): SurfaceSummary {
  return {
    id: surface.id,
    label: surface.label,
    capturedAt: iso(surface.capturedAt),
    endedAt: iso(surface.endedAt),
    recordingCount: surface.recordings.length,
    sampleCount: surface.recordings.reduce((sum, r) => sum + r.samples.length, 0),
    flags: { ...surface.flags },
    session: patient.registry.sessionRefOf(surface.id) ?? null,
  };
}

export function serializeNativeTree(patient: Patient) {
  return {
    id: patient.id,
    details: patient.details
      ? { ...patient.details, dateOfBirth: patient.details.dateOfBirth?.toISOString() }
      : null,
    surfaceCount: patient.registry.size,
    sites: patient.sites.map(site => ({
      id: site.id,
      phases: site.phases.map(phase => ({
        id: phase.id,
        fields: phase.fields.map(field => ({
          id: field.id,
          issues: field.issues,
          surfaces: field.surfaces.map(surface => summarizeSurface(patient, surface)),
        })),
      })),
    })),
  };
}

export function serializeCalendar(calendar: TreatmentCalendar) {
  return {
    patientId: calendar.patientId,
    sessionGapMinutes: calendar.sessionGapMinutes,
    days: calendar.days.map(day => ({
      date: day.date,
      sessions: day.sessions.map(session => ({
        index: session.index,
        startTime: session.startTime.toISOString(),
        endTime: session.endTime.toISOString(),
        captureCount: session.captureCount,
        surfaceIds: session.surfaces.map(surface => surface.id),
      })),
    })),
    skippedSurfaceIds: calendar.skipped.map(surface => surface.id),
  };
}
