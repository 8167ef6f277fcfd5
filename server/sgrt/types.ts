import type { LoadWarning } from '@shared/schema';

export type SurfaceId = number;

export type IniDetails = Record<string, string | null>;

/** One row of a RealTimeDeltas recording. Translations in cm, rotations in degrees. */
export interface DeltaSample {
  elapsedSeconds: number;
  clockTime: Date | null;
  vrt: number;
  lng: number;
  lat: number;
  rtn: number;
  roll: number;
  pitch: number;
  magnitude: number;
  beamOn: boolean;
  // The device writes 999 into every translation axis when it loses the patient.
  patientNotFound: boolean;
}

export interface ToleranceFlags {
  outOfTolerance: boolean | null;
  beamOnSamples: number;
  patientNotFoundSamples: number;
}

/** What a CaptureDecoder yields for one payload file. */
export interface DecodedCapture {
  timestamp: Date | null;
  endTime: Date | null;
  header: IniDetails;
  deltas: DeltaSample[];
  flags: ToleranceFlags;
}

export interface MonitoringRecording {
  label: string;
  path: string;
  startTime: Date | null;
  endTime: Date | null;
  header: IniDetails;
  samples: DeltaSample[];
  flags: ToleranceFlags;
}

export interface SurfaceFlags {
  suspect: boolean;
  outOfTolerance: boolean | null;
  missingTimestamp: boolean;
  beamOnSamples: number;
  patientNotFoundSamples: number;
}

/** Back-reference from a Surface to the Field that owns it. */
export interface NativePath {
  patientId: string;
  siteId: string;
  phaseId: string;
  fieldId: string;
}

export interface Surface {
  readonly id: SurfaceId;
  readonly label: string;
  readonly path: string;
  readonly owner: Readonly<NativePath>;
  readonly capturedAt: Date | null;
  readonly endedAt: Date | null;
  readonly recordings: readonly MonitoringRecording[];
  readonly captureDetails: Readonly<IniDetails>;
  readonly siteDetails: Readonly<IniDetails>;
  readonly flags: Readonly<SurfaceFlags>;
}

export interface Field {
  readonly id: string;
  readonly path: string;
  readonly surfaces: readonly Surface[];
  readonly issues: readonly LoadWarning[];
}

export interface Phase {
  readonly id: string;
  readonly path: string;
  readonly fields: readonly Field[];
}

export interface Site {
  readonly id: string;
  readonly path: string;
  readonly phases: readonly Phase[];
}

export interface PatientDetails {
  guid?: string;
  description?: string;
  isFromDicom?: boolean;
  firstName?: string;
  middleName?: string;
  surname?: string;
  patientId?: string;
  patientVersion?: string;
  notes?: string;
  sex?: string;
  dateOfBirth?: Date;
}

// ---------------------------------------------------------------------------
// Calendar hierarchy
// ---------------------------------------------------------------------------

export interface TreatmentSession {
  readonly index: number;
  readonly startTime: Date;
  readonly endTime: Date;
  readonly captureCount: number;
  readonly surfaces: readonly Surface[];
}

export interface TreatmentDay {
  /** Local calendar date, yyyy-MM-dd. */
  readonly date: string;
  readonly sessions: readonly TreatmentSession[];
}

export interface TreatmentCalendar {
  readonly patientId: string;
  readonly sessionGapMinutes: number;
  readonly days: readonly TreatmentDay[];
  readonly skipped: readonly Surface[];
}

export interface SessionRef {
  date: string;
  sessionIndex: number;
}
