import { addMilliseconds } from 'date-fns';
import { IncompleteRecord, MalformedRecord } from './errors';
import { parseDeviceTimestamp } from './time';
import type { CaptureDecoder } from './surface-parser';
import type { DecodedCapture, DeltaSample, IniDetails, ToleranceFlags } from './types';

/**
 * RealTimeDeltas_<yyMMdd_HHmmss>.txt decoder
 *
 * The file is a `Key:, value` header followed by a CSV block whose first line starts
 * with `Elapsed Time (sec)`. Older software versions wrote translations in mm.
 */

const COLUMN_LINE_PREFIX = 'Elapsed Time (sec)';
const HEADER_SEPARATOR = ':, ';
const NOT_FOUND_SENTINEL = 999;

const TRANSLATION_AXES = ['VRT', 'LNG', 'LAT'] as const;
const ROTATION_COLUMNS = {
  rtn: 'D.Rtn (deg)',
  roll: 'D.Roll (deg)',
  pitch: 'D.Pitch (deg)',
} as const;

type TranslationAxis = typeof TRANSLATION_AXES[number];

interface ColumnLayout {
  elapsed: number;
  translations: Record<TranslationAxis, { index: number; scale: number }>;
  rotations: Record<keyof typeof ROTATION_COLUMNS, number>;
  xray: number | null;
}

export class RealTimeDeltasDecoder implements CaptureDecoder {
  decode(bytes: Uint8Array, sourcePath = '<memory>'): DecodedCapture {
    const lines = Buffer.from(bytes).toString('latin1').split(/\r?\n/);
    const columnLine = lines.findIndex(line => line.trim().startsWith(COLUMN_LINE_PREFIX));
    if (columnLine < 0) {
      throw new MalformedRecord(`No "${COLUMN_LINE_PREFIX}" column line`, sourcePath);
    }

    const header = this.parseHeader(lines.slice(0, columnLine));
    const layout = this.resolveColumns(lines[columnLine], sourcePath);
    const timestamp = parseDeviceTimestamp(header['Start Time']);
    const endTime = parseDeviceTimestamp(header['End Time']);

    const deltas: DeltaSample[] = [];
    for (let i = columnLine + 1; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;
      deltas.push(this.parseRow(line, layout, timestamp, `${sourcePath}:${i + 1}`));
    }

    return { timestamp, endTime, header, deltas, flags: toleranceFlags(header, deltas) };
  }

  private parseHeader(lines: string[]): IniDetails {
    const header: IniDetails = {};
    for (const line of lines) {
      if (!line.trim()) continue;
      const separator = line.indexOf(HEADER_SEPARATOR);
      if (separator < 0) {
        header[line.trim()] = null;
        continue;
      }
      const key = line.slice(0, separator).trim();
      header[key] = line.slice(separator + HEADER_SEPARATOR.length).split('\x00')[0].trim();
    }
    return header;
  }

  private resolveColumns(columnLine: string, sourcePath: string): ColumnLayout {
    const names = columnLine.split(',').map(name => name.trim());
    const missing: string[] = [];

    const column = (name: string): number => {
      const index = names.indexOf(name);
      if (index < 0) missing.push(name);
      return index;
    };
    const translation = (axis: TranslationAxis) => {
      const cm = names.indexOf(`D.${axis} (cm)`);
      if (cm >= 0) return { index: cm, scale: 1 };
      const mm = names.indexOf(`D.${axis} (mm)`);
      if (mm >= 0) return { index: mm, scale: 0.1 };
      missing.push(`D.${axis} (cm)`);
      return { index: -1, scale: 1 };
    };

    const layout: ColumnLayout = {
      elapsed: column(COLUMN_LINE_PREFIX),
      translations: { VRT: translation('VRT'), LNG: translation('LNG'), LAT: translation('LAT') },
      rotations: {
        rtn: column(ROTATION_COLUMNS.rtn),
        roll: column(ROTATION_COLUMNS.roll),
        pitch: column(ROTATION_COLUMNS.pitch),
      },
      xray: names.includes('XRayState') ? names.indexOf('XRayState') : null,
    };

    if (missing.length > 0) {
      throw new IncompleteRecord(`Missing delta columns: ${missing.join(', ')}`, sourcePath);
    }
    return layout;
  }

  private parseRow(line: string, layout: ColumnLayout, start: Date | null, location: string): DeltaSample {
    const cells = line.split(',');
    const numberAt = (index: number, label: string): number => {
      const value = Number((cells[index] ?? '').trim());
      if (cells[index] === undefined || cells[index].trim() === '' || !Number.isFinite(value)) {
        throw new MalformedRecord(`Non-numeric ${label} value "${cells[index] ?? ''}"`, location);
      }
      return value;
    };

    const elapsedSeconds = numberAt(layout.elapsed, 'elapsed time');
    const [vrt, lng, lat] = TRANSLATION_AXES.map(axis => {
      const { index, scale } = layout.translations[axis];
      return numberAt(index, `D.${axis}`) * scale;
    });
    const rtn = numberAt(layout.rotations.rtn, ROTATION_COLUMNS.rtn);
    const roll = numberAt(layout.rotations.roll, ROTATION_COLUMNS.roll);
    const pitch = numberAt(layout.rotations.pitch, ROTATION_COLUMNS.pitch);
    const xray = layout.xray === null ? 0 : Number((cells[layout.xray] ?? '0').trim());

    return {
      elapsedSeconds,
      clockTime: start ? addMilliseconds(start, Math.round(elapsedSeconds * 1000)) : null,
      vrt,
      lng,
      lat,
      rtn,
      roll,
      pitch,
      magnitude: Math.sqrt(vrt * vrt + lng * lng + lat * lat),
      beamOn: xray === 1,
      patientNotFound: [vrt, lng, lat].some(v => Math.abs(v) >= NOT_FOUND_SENTINEL),
    };
  }
}

function readThreshold(header: IniDetails, key: string): number | null {
  const raw = header[key];
  if (raw === null || raw === undefined || raw === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export function toleranceFlags(header: IniDetails, deltas: DeltaSample[]): ToleranceFlags {
  const translationLimit = readThreshold(header, 'Translation Threshold (cm)');
  const rotationLimit = readThreshold(header, 'Rotation Threshold (deg)');
  const hasLimits = translationLimit !== null || rotationLimit !== null;

  let outOfTolerance = false;
  let beamOnSamples = 0;
  let patientNotFoundSamples = 0;

  for (const sample of deltas) {
    if (sample.patientNotFound) {
      patientNotFoundSamples++;
      continue;
    }
    if (!sample.beamOn) continue;
    beamOnSamples++;
    if (translationLimit !== null && sample.magnitude > translationLimit) outOfTolerance = true;
    if (rotationLimit !== null && maxRotation(sample) > rotationLimit) outOfTolerance = true;
  }

  return {
    outOfTolerance: hasLimits ? outOfTolerance : null,
    beamOnSamples,
    patientNotFoundSamples,
  };
}

export const maxRotation = (sample: DeltaSample): number =>
  Math.max(Math.abs(sample.rtn), Math.abs(sample.roll), Math.abs(sample.pitch));

export const maxTranslation = (sample: DeltaSample): number =>
  Math.max(Math.abs(sample.vrt), Math.abs(sample.lng), Math.abs(sample.lat));
