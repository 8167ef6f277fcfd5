import * as path from 'path';
import { addMilliseconds } from 'date-fns';
import { DEFAULT_SGRT_CONFIG, type PlausibilityLimits } from '@shared/schema';
import {
  IncompleteRecord,
  MalformedRecord,
  MissingTimestamp,
  errorMessage,
  isSgrtError,
} from './errors';
import { hasFile, type DirectoryEntry, type FileSystemSource } from './filesystem';
import { maxRotation, maxTranslation } from './realtime-deltas-decoder';
import { parseFlexibleTimestamp, timestampFromName } from './time';
import type {
  DecodedCapture,
  DeltaSample,
  IniDetails,
  MonitoringRecording,
  NativePath,
  Surface,
  SurfaceFlags,
  SurfaceId,
} from './types';

export const CAPTURE_INI = 'capture.ini';
export const SITE_INI = 'site.ini';
const MONITORING_PREFIX = 'Monitoring';

// site.ini wraps these values in double quotes
const QUOTED_SITE_KEYS = ['Treatment Site', 'Phase', 'Field'];

/** Device-specific decoding of one monitoring payload. */
export interface CaptureDecoder {
  decode(bytes: Uint8Array, sourcePath?: string): DecodedCapture;
}

export interface SurfaceParserOptions {
  fileSystem: FileSystemSource;
  decoder: CaptureDecoder;
  plausibility?: PlausibilityLimits;
}

export interface ParsedSurface {
  surface: Surface;
  /** Recoverable findings; the surface is still usable. */
  warnings: MissingTimestamp[];
}

export const isCaptureUnit = (entries: DirectoryEntry[]): boolean => hasFile(entries, CAPTURE_INI);

/**
 * Builds one Surface from its capture directory:
 *
 *   <surface>/capture.ini
 *   <surface>/site.ini                                  (optional)
 *   <surface>/Monitoring_<ts>/RealTimeDeltas_<ts>.txt   (zero or more)
 *
 * Throws MalformedRecord or IncompleteRecord for structurally broken captures.
 * Out-of-range deltas only mark the surface as suspect.
 */
export class SurfaceRecordParser {
  private readonly fileSystem: FileSystemSource;
  private readonly decoder: CaptureDecoder;
  private readonly plausibility: PlausibilityLimits;

  constructor(options: SurfaceParserOptions) {
    this.fileSystem = options.fileSystem;
    this.decoder = options.decoder;
    this.plausibility = options.plausibility ?? DEFAULT_SGRT_CONFIG.plausibility;
  }

  parse(surfaceDir: string, owner: NativePath, id: SurfaceId): ParsedSurface {
    const entries = this.listOrFail(surfaceDir);
    if (!isCaptureUnit(entries)) {
      throw new MalformedRecord(`Capture directory has no ${CAPTURE_INI}`, surfaceDir);
    }

    const label = path.basename(surfaceDir);
    const captureDetails = this.readIni(path.join(surfaceDir, CAPTURE_INI));
    const siteDetails = hasFile(entries, SITE_INI)
      ? unquoteSiteDetails(this.readIni(path.join(surfaceDir, SITE_INI)))
      : {};

    const recordings = entries
      .filter(entry => entry.kind === 'directory' && entry.name.startsWith(MONITORING_PREFIX))
      .map(entry => this.readRecording(path.join(surfaceDir, entry.name)))
      .sort(compareRecordings);

    const capturedAt =
      earliest(recordings.map(r => r.startTime)) ??
      parseFlexibleTimestamp(captureDetails['Timestamp']) ??
      timestampFromName(label);

    const warnings: MissingTimestamp[] = [];
    if (!capturedAt) {
      warnings.push(new MissingTimestamp('No capture time in payload, folder names or capture.ini', surfaceDir));
    }

    const surface: Surface = {
      id,
      label,
      path: surfaceDir,
      owner: { ...owner },
      capturedAt,
      endedAt: latest(recordings.map(recordingEnd)) ?? capturedAt,
      recordings,
      captureDetails,
      siteDetails,
      flags: this.surfaceFlags(recordings, capturedAt === null),
    };
    return { surface, warnings };
  }

  private listOrFail(dir: string): DirectoryEntry[] {
    try {
      return this.fileSystem.list(dir);
    } catch (error) {
      throw new MalformedRecord(`Cannot list capture directory: ${errorMessage(error)}`, dir, { cause: error });
    }
  }

  private readBytes(filePath: string): Uint8Array {
    try {
      return this.fileSystem.read(filePath);
    } catch (error) {
      throw new MalformedRecord(`Cannot read file: ${errorMessage(error)}`, filePath, { cause: error });
    }
  }

  private readIni(filePath: string): IniDetails {
    const text = Buffer.from(this.readBytes(filePath)).toString('latin1');
    if (text.includes('\x00')) {
      throw new MalformedRecord('Binary content in ini file', filePath);
    }

    const details: IniDetails = {};
    for (const rawLine of text.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line) continue;
      const eq = line.indexOf('=');
      if (eq < 0) {
        details[line] = null;
      } else {
        details[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
      }
    }
    return details;
  }

  private readRecording(monitoringDir: string): MonitoringRecording {
    const label = path.basename(monitoringDir);
    const suffix = label.slice(MONITORING_PREFIX.length).replace(/^_/, '');
    const payloadName = `RealTimeDeltas_${suffix}.txt`;

    let entries: DirectoryEntry[];
    try {
      entries = this.fileSystem.list(monitoringDir);
    } catch (error) {
      throw new MalformedRecord(`Cannot list monitoring directory: ${errorMessage(error)}`, monitoringDir, { cause: error });
    }
    if (!hasFile(entries, payloadName)) {
      throw new IncompleteRecord(`Monitoring folder has no ${payloadName}`, monitoringDir);
    }

    const payloadPath = path.join(monitoringDir, payloadName);
    const decoded = this.decode(payloadPath);
    const folderTime = timestampFromName(label);
    const startTime = decoded.timestamp ?? folderTime;

    return {
      label,
      path: payloadPath,
      startTime,
      endTime: decoded.endTime,
      header: decoded.header,
      // Payload without a Start Time: clock times come from the folder name instead
      samples: decoded.timestamp === null && startTime !== null
        ? withClockTimes(decoded.deltas, startTime)
        : decoded.deltas,
      flags: decoded.flags,
    };
  }

  private decode(payloadPath: string): DecodedCapture {
    const bytes = this.readBytes(payloadPath);
    try {
      return this.decoder.decode(bytes, payloadPath);
    } catch (error) {
      if (isSgrtError(error)) throw error;
      throw new MalformedRecord(`Decoder failed: ${errorMessage(error)}`, payloadPath, { cause: error });
    }
  }

  private surfaceFlags(recordings: MonitoringRecording[], missingTimestamp: boolean): SurfaceFlags {
    const { maxTranslationCm, maxRotationDeg } = this.plausibility;
    const samples = recordings.flatMap(r => r.samples).filter(s => !s.patientNotFound);
    const tolerance = recordings.map(r => r.flags.outOfTolerance).filter((v): v is boolean => v !== null);

    return {
      suspect: samples.some(s => maxTranslation(s) > maxTranslationCm || maxRotation(s) > maxRotationDeg),
      outOfTolerance: tolerance.length > 0 ? tolerance.some(Boolean) : null,
      missingTimestamp,
      beamOnSamples: recordings.reduce((sum, r) => sum + r.flags.beamOnSamples, 0),
      patientNotFoundSamples: recordings.reduce((sum, r) => sum + r.flags.patientNotFoundSamples, 0),
    };
  }
}

function unquoteSiteDetails(details: IniDetails): IniDetails {
  const result: IniDetails = { ...details };
  for (const key of QUOTED_SITE_KEYS) {
    const value = result[key];
    if (value && value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      result[key] = value.slice(1, -1);
    }
  }
  return result;
}

function withClockTimes(samples: DeltaSample[], start: Date): DeltaSample[] {
  return samples.map(sample => ({
    ...sample,
    clockTime: addMilliseconds(start, Math.round(sample.elapsedSeconds * 1000)),
  }));
}

function recordingEnd(recording: MonitoringRecording): Date | null {
  const lastSample = recording.samples[recording.samples.length - 1];
  return recording.endTime ?? lastSample?.clockTime ?? recording.startTime;
}

function compareRecordings(a: MonitoringRecording, b: MonitoringRecording): number {
  if (a.startTime && b.startTime) return a.startTime.getTime() - b.startTime.getTime();
  if (a.startTime) return -1;
  if (b.startTime) return 1;
  return a.label.localeCompare(b.label);
}

function earliest(dates: Array<Date | null>): Date | null {
  let result: Date | null = null;
  for (const date of dates) {
    if (date && (!result || date.getTime() < result.getTime())) result = date;
  }
  return result;
}

function latest(dates: Array<Date | null>): Date | null {
  let result: Date | null = null;
  for (const date of dates) {
    if (date && (!result || date.getTime() > result.getTime())) result = date;
  }
  return result;
}
