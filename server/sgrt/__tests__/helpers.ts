import * as path from 'path';
import type { DirectoryEntry, FileSystemSource } from '../filesystem';

/**
 * In-process stand-in for the patient database. Listings come back in reverse
 * insertion order so nothing can silently rely on sorted directory listings.
 */
export class MemoryFileSystem implements FileSystemSource {
  private readonly files = new Map<string, Uint8Array>();
  private readonly dirs = new Map<string, Set<string>>();
  private readonly unreadable = new Set<string>();
  readonly reads: string[] = [];

  addDir(dirPath: string): this {
    const normalized = path.normalize(dirPath);
    if (this.dirs.has(normalized)) return this;
    this.dirs.set(normalized, new Set());
    const parent = path.dirname(normalized);
    if (parent !== normalized) {
      this.addDir(parent);
      this.dirs.get(parent)?.add(path.basename(normalized));
    }
    return this;
  }

  addFile(filePath: string, content: string | Uint8Array): this {
    const normalized = path.normalize(filePath);
    const parent = path.dirname(normalized);
    this.addDir(parent);
    this.dirs.get(parent)?.add(path.basename(normalized));
    this.files.set(normalized, typeof content === 'string' ? Buffer.from(content, 'latin1') : content);
    return this;
  }

  /** Makes `list` throw for this directory, like an EACCES from the OS. */
  markUnreadable(dirPath: string): this {
    this.unreadable.add(path.normalize(dirPath));
    return this;
  }

  list(dirPath: string): DirectoryEntry[] {
    const normalized = path.normalize(dirPath);
    const children = this.dirs.get(normalized);
    if (!children || this.unreadable.has(normalized)) {
      throw new Error(`EACCES: cannot list ${normalized}`);
    }
    return [...children].reverse().map(name => {
      const child = path.join(normalized, name);
      return this.dirs.has(child) ? { kind: 'directory' as const, name } : { kind: 'file' as const, name };
    });
  }

  read(filePath: string): Uint8Array {
    const normalized = path.normalize(filePath);
    const content = this.files.get(normalized);
    if (!content) throw new Error(`ENOENT: no such file ${normalized}`);
    this.reads.push(normalized);
    return content;
  }
}

const COLUMN_LINE =
  'Elapsed Time (sec), D.VRT (cm), D.LNG (cm), D.LAT (cm), D.Rtn (deg), D.Roll (deg), D.Pitch (deg), XRayState';

export interface RtdOptions {
  start?: string;
  end?: string;
  header?: Record<string, string>;
  columnLine?: string;
  rows?: string[];
}

/** RealTimeDeltas text with a device-style header. */
export function rtdText(options: RtdOptions = {}): string {
  const header: Record<string, string> = {
    'Patient ID': 'P001',
    'Site': 'S1',
    'Phase': 'Ph1',
    'Field': 'F1',
    ...(options.start !== undefined ? { 'Start Time': options.start } : {}),
    ...(options.end !== undefined ? { 'End Time': options.end } : {}),
    ...options.header,
  };
  const rows = options.rows ?? ['0.0, 0.10, -0.05, 0.02, 0.3, -0.1, 0.2, 0', '1.0, 0.12, -0.04, 0.01, 0.2, -0.1, 0.1, 1'];
  return [
    ...Object.entries(header).map(([key, value]) => `${key}:, ${value}`),
    options.columnLine ?? COLUMN_LINE,
    ...rows,
    '',
  ].join('\n');
}

export interface SurfaceFixture {
  /** yyMMdd_HHmmss; adds Monitoring_<ts>/RealTimeDeltas_<ts>.txt */
  monitoring?: string;
  rtd?: string;
  captureIni?: string;
  siteIni?: string;
  /** Leave out capture.ini entirely. */
  noCaptureIni?: boolean;
}

export function addSurface(fs: MemoryFileSystem, surfaceDir: string, fixture: SurfaceFixture = {}): void {
  fs.addDir(surfaceDir);
  if (!fixture.noCaptureIni) {
    fs.addFile(path.join(surfaceDir, 'capture.ini'), fixture.captureIni ?? 'Version=5.1\nReference=true\n');
  }
  if (fixture.siteIni !== undefined) {
    fs.addFile(path.join(surfaceDir, 'site.ini'), fixture.siteIni);
  }
  if (fixture.monitoring) {
    const ts = fixture.monitoring;
    fs.addFile(
      path.join(surfaceDir, `Monitoring_${ts}`, `RealTimeDeltas_${ts}.txt`),
      fixture.rtd ?? rtdText({ start: ts }),
    );
  }
}

/** A capture with no monitoring data, timed only by capture.ini. */
export function addTimedSurface(fs: MemoryFileSystem, surfaceDir: string, timestamp: string): void {
  addSurface(fs, surfaceDir, { captureIni: `Timestamp=${timestamp}\n` });
}
