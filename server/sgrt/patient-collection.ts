import * as path from 'path';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import {
  sgrtConfigSchema,
  type LoadReport,
  type LoadWarning,
  type PatientOutcome,
  type SgrtConfig,
  type SgrtConfigInput,
} from '@shared/schema';
import { logger as defaultLogger, type Logger } from '../logger';
import { CalendarReprocessor } from './calendar-reprocessor';
import { HierarchyIntegrityError, PatientNotFound, errorMessage, isSgrtError } from './errors';
import { NodeFileSystem, directoryNames, type DirectoryEntry, type FileSystemSource } from './filesystem';
import { TreeHierarchyBuilder } from './hierarchy-builder';
import type { Patient } from './patient';
import { RealTimeDeltasDecoder } from './realtime-deltas-decoder';
import { SurfaceRecordParser, type CaptureDecoder } from './surface-parser';

export interface PatientCollectionOptions {
  config?: SgrtConfigInput;
  fileSystem?: FileSystemSource;
  decoder?: CaptureDecoder;
  logger?: Logger;
}

/**
 * Criteria for `PatientCollection.filter`. Given lists are OR-ed together and
 * match by substring; `numericIdsOnly` then drops every id that is not all digits.
 */
export interface PatientFilter {
  patientIds?: readonly string[];
  phases?: readonly string[];
  numericIdsOnly?: boolean;
}

export interface AsyncLoadOptions extends PatientCollectionOptions {
  /** Checked between patient builds; a build in progress always completes. */
  signal?: AbortSignal;
}

interface Pipeline {
  config: SgrtConfig;
  fileSystem: FileSystemSource;
  builder: TreeHierarchyBuilder;
  reprocessor: CalendarReprocessor;
  log: Logger;
}

/**
 * All patients under one or more PData roots.
 *
 * Construction is explicit (`load` / `loadAsync`); there is no shared cache, so
 * dropping the instance releases every Patient it holds. One patient's failure
 * is recorded in `report` and never stops its siblings. A patient id already
 * seen under an earlier root is skipped and reported on the first one.
 */
export class PatientCollection implements Iterable<Patient> {
  private readonly patients = new Map<string, Patient>();
  private readonly outcomes = new Map<string, PatientOutcome>();
  private readonly sources = new Map<string, string>();

  readonly roots: readonly string[];

  private constructor(roots: readonly string[], readonly config: SgrtConfig) {
    this.roots = [...roots];
  }

  static load(roots: string | readonly string[], options: PatientCollectionOptions = {}): PatientCollection {
    const pipeline = createPipeline(options);
    const rootList = toRootList(roots);
    const collection = new PatientCollection(rootList, pipeline.config);

    rootList.forEach((root, rootIndex) => {
      const patientDirs = listPatientDirectories(pipeline.fileSystem, root);
      patientDirs.forEach((name, index) => {
        pipeline.log.debug(
          `Processing folder ${index + 1} of ${patientDirs.length} in directory ${rootIndex + 1} of ${rootList.length}: ${name}`,
          'sgrt-collection',
        );
        collection.loadPatient(pipeline, path.join(root, name));
      });
    });

    collection.logSummary(pipeline.log);
    return collection;
  }

  /**
   * Same result as `load`, but yields to the event loop between patients and
   * stops with the signal's reason once it is aborted.
   */
  static async loadAsync(roots: string | readonly string[], options: AsyncLoadOptions = {}): Promise<PatientCollection> {
    const { signal } = options;
    signal?.throwIfAborted();

    const pipeline = createPipeline(options);
    const rootList = toRootList(roots);
    const collection = new PatientCollection(rootList, pipeline.config);

    for (const [rootIndex, root] of rootList.entries()) {
      const patientDirs = listPatientDirectories(pipeline.fileSystem, root);
      for (const [index, name] of patientDirs.entries()) {
        await yieldToEventLoop();
        signal?.throwIfAborted();
        pipeline.log.debug(
          `Processing folder ${index + 1} of ${patientDirs.length} in directory ${rootIndex + 1} of ${rootList.length}: ${name}`,
          'sgrt-collection',
        );
        collection.loadPatient(pipeline, path.join(root, name));
      }
    }

    collection.logSummary(pipeline.log);
    return collection;
  }

  get(patientId: string): Patient {
    const patient = this.patients.get(patientId);
    if (!patient) throw new PatientNotFound(patientId);
    return patient;
  }

  has(patientId: string): boolean {
    return this.patients.has(patientId);
  }

  /** Number of successfully loaded patients. */
  get size(): number {
    return this.patients.size;
  }

  [Symbol.iterator](): IterableIterator<Patient> {
    return this.patients.values();
  }

  ids(): string[] {
    return [...this.patients.keys()];
  }

  /** Loaded patients carrying at least one warning. */
  get warnedPatientCount(): number {
    let count = 0;
    for (const outcome of this.outcomes.values()) {
      if (outcome.status === 'loaded' && outcome.warnings.length > 0) count++;
    }
    return count;
  }

  outcomeOf(patientId: string): PatientOutcome | undefined {
    return this.outcomes.get(patientId);
  }

  /**
   * A new collection holding the loaded patients that match `criteria`. The
   * Patient instances and their outcomes are shared, not copied. With no
   * criteria every loaded patient is kept; failed patients never are.
   */
  filter(criteria: PatientFilter = {}): PatientCollection {
    const selected = new PatientCollection(this.roots, this.config);
    for (const [id, patient] of this.patients) {
      if (!matchesFilter(patient, criteria)) continue;
      selected.patients.set(id, patient);
      const outcome = this.outcomes.get(id);
      if (outcome) selected.outcomes.set(id, outcome);
      const source = this.sources.get(id);
      if (source) selected.sources.set(id, source);
    }
    return selected;
  }

  get report(): LoadReport {
    let failed = 0;
    const patients: Record<string, PatientOutcome> = {};
    for (const [id, outcome] of this.outcomes) {
      patients[id] = outcome;
      if (outcome.status === 'failed') failed++;
    }
    return {
      roots: [...this.roots],
      loaded: this.patients.size,
      failed,
      warned: this.warnedPatientCount,
      patients,
    };
  }

  private loadPatient(pipeline: Pipeline, patientDir: string): void {
    const patientId = path.basename(patientDir);
    const firstSeen = this.sources.get(patientId);
    if (firstSeen !== undefined) {
      this.reportDuplicate(pipeline.log, patientId, patientDir, firstSeen);
      return;
    }
    this.sources.set(patientId, patientDir);

    try {
      const { patient } = pipeline.builder.build(patientDir);
      const reprocessed = pipeline.reprocessor.reprocess(patient);
      patient.attachCalendar(reprocessed.calendar);
      patient.recordWarnings(reprocessed.warnings);

      this.patients.set(patientId, patient);
      this.outcomes.set(patientId, {
        status: 'loaded',
        warnings: [...patient.warnings],
        skippedSurfaces: reprocessed.calendar.skipped.map(surface => surface.id),
      });
    } catch (error) {
      if (!isSgrtError(error)) throw error;
      pipeline.log.error(`Patient ${patientId} failed: ${error.kind}: ${error.message}`, 'sgrt-collection');
      this.outcomes.set(patientId, {
        status: 'failed',
        reason: error.kind,
        message: error.message,
        warnings: [...error.warnings],
      });
    }
  }

  private reportDuplicate(log: Logger, patientId: string, patientDir: string, firstSeen: string): void {
    const warning: LoadWarning = {
      kind: 'HierarchyIntegrityError',
      message: `Duplicate patient id ${patientId}; already loaded from ${firstSeen}, skipped`,
      path: patientDir,
      scope: { patientId },
    };
    log.warn(warning.message, 'sgrt-collection');

    this.patients.get(patientId)?.recordWarnings([warning]);
    const outcome = this.outcomes.get(patientId);
    if (outcome) this.outcomes.set(patientId, { ...outcome, warnings: [...outcome.warnings, warning] });
  }

  private logSummary(log: Logger): void {
    const { loaded, failed, warned } = this.report;
    log.info(`Loaded ${loaded} patients from ${this.roots.join(', ')} (${failed} failed, ${warned} with warnings)`, 'sgrt-collection');
  }
}

function createPipeline(options: PatientCollectionOptions): Pipeline {
  const config = sgrtConfigSchema.parse(options.config ?? {});
  const fileSystem = options.fileSystem ?? new NodeFileSystem();
  const log = options.logger ?? defaultLogger;
  const parser = new SurfaceRecordParser({
    fileSystem,
    decoder: options.decoder ?? new RealTimeDeltasDecoder(),
    plausibility: config.plausibility,
  });
  return {
    config,
    fileSystem,
    builder: new TreeHierarchyBuilder({ fileSystem, parser, strictMode: config.strictMode, logger: log }),
    reprocessor: new CalendarReprocessor({ sessionGapMinutes: config.sessionGapMinutes }),
    log,
  };
}

function toRootList(roots: string | readonly string[]): string[] {
  return typeof roots === 'string' ? [roots] : [...roots];
}

function matchesFilter(patient: Patient, criteria: PatientFilter): boolean {
  const patientIds = criteria.patientIds ?? [];
  const phases = criteria.phases ?? [];
  if (criteria.numericIdsOnly && !/^\d+$/.test(patient.id)) return false;
  if (patientIds.length === 0 && phases.length === 0) return true;

  if (patientIds.some(pattern => patient.id.includes(pattern))) return true;
  return patient.sites.some(site => site.phases.some(phase => phases.some(pattern => phase.id.includes(pattern))));
}

function listPatientDirectories(fileSystem: FileSystemSource, root: string): string[] {
  let entries: DirectoryEntry[];
  try {
    entries = fileSystem.list(root);
  } catch (error) {
    throw new HierarchyIntegrityError(`Cannot list patient database root: ${errorMessage(error)}`, root, false, { cause: error });
  }
  return directoryNames(entries);
}
