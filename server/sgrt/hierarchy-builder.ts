import * as path from 'path';
import type { LoadWarning, WarningScope } from '@shared/schema';
import { logger as defaultLogger, type Logger } from '../logger';
import { EntityRegistry } from './entity-registry';
import {
  HierarchyIntegrityError,
  errorMessage,
  isSgrtError,
  toWarning,
} from './errors';
import { directoryNames, type DirectoryEntry, type FileSystemSource } from './filesystem';
import { PATIENT_DETAILS_FILES, parsePatientDetails } from './patient-details';
import { Patient } from './patient';
import { SurfaceRecordParser, isCaptureUnit } from './surface-parser';
import type { Field, NativePath, PatientDetails, Phase, Site, Surface } from './types';

export interface HierarchyBuilderOptions {
  fileSystem: FileSystemSource;
  parser: SurfaceRecordParser;
  strictMode?: boolean;
  logger?: Logger;
}

export interface BuildResult {
  patient: Patient;
  warnings: LoadWarning[];
}

interface ChildDirectory {
  name: string;
  entries: DirectoryEntry[];
}

interface BuildContext {
  patientId: string;
  registry: EntityRegistry;
  warnings: LoadWarning[];
}

/**
 * Walks one patient directory, one level per entity type:
 *
 *   <patient>/<site>/<phase>/<field>/<surface>
 *
 * Capture failures are collected against their Field. A capture unit found
 * above Field level is a HierarchyIntegrityError: fatal at patient level,
 * otherwise the offending Site or Phase is dropped unless strictMode is set.
 */
export class TreeHierarchyBuilder {
  private readonly fileSystem: FileSystemSource;
  private readonly parser: SurfaceRecordParser;
  private readonly strictMode: boolean;
  private readonly log: Logger;

  constructor(options: HierarchyBuilderOptions) {
    this.fileSystem = options.fileSystem;
    this.parser = options.parser;
    this.strictMode = options.strictMode ?? false;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Throws a HierarchyIntegrityError, or in strict mode any SgrtError. The
   * warnings recorded before the failure travel on the error.
   */
  build(patientDir: string): BuildResult {
    const patientId = path.basename(patientDir);
    const ctx: BuildContext = { patientId, registry: new EntityRegistry(patientId), warnings: [] };
    try {
      return this.buildPatient(ctx, patientDir);
    } catch (error) {
      if (isSgrtError(error)) throw error.withWarnings(ctx.warnings);
      throw error;
    }
  }

  private buildPatient(ctx: BuildContext, patientDir: string): BuildResult {
    const { patientId } = ctx;

    let entries: DirectoryEntry[];
    try {
      entries = this.fileSystem.list(patientDir);
    } catch (error) {
      throw new HierarchyIntegrityError(`Cannot list patient directory: ${errorMessage(error)}`, patientDir, false, { cause: error });
    }
    if (isCaptureUnit(entries)) {
      throw new HierarchyIntegrityError('Patient directory is itself a capture unit', patientDir);
    }

    const details = this.readDetails(patientDir, entries, ctx);

    const sites: Site[] = [];
    for (const name of directoryNames(entries)) {
      const sitePath = path.join(patientDir, name);
      const site = this.isolate(ctx, { patientId, siteId: name }, () => {
        const siteEntries = this.listOrThrow(sitePath, 'Site');
        if (isCaptureUnit(siteEntries)) {
          // Flat layout: surfaces sit in the patient folder with no Site/Phase/Field to own them
          throw new HierarchyIntegrityError(`Capture unit "${name}" found directly under Patient`, patientDir);
        }
        return this.buildSite(ctx, sitePath, siteEntries, name);
      });
      if (site) sites.push(site);
    }

    const patient = new Patient(patientId, patientDir, sites, details, ctx.registry, ctx.warnings);
    this.log.debug(`Built ${patientId}: ${sites.length} sites, ${ctx.registry.size} surfaces, ${ctx.warnings.length} warnings`, 'sgrt-builder');
    return { patient, warnings: ctx.warnings };
  }

  private buildSite(ctx: BuildContext, sitePath: string, entries: DirectoryEntry[], siteId: string): Site {
    const phases: Phase[] = [];
    for (const child of this.childDirectories(sitePath, entries, 'Site')) {
      const phasePath = path.join(sitePath, child.name);
      const scope = { patientId: ctx.patientId, siteId, phaseId: child.name };
      const phase = this.isolate(ctx, scope, () => this.buildPhase(ctx, phasePath, child.entries, siteId, child.name));
      if (phase) phases.push(phase);
    }
    return { id: siteId, path: sitePath, phases };
  }

  private buildPhase(ctx: BuildContext, phasePath: string, entries: DirectoryEntry[], siteId: string, phaseId: string): Phase {
    const fields = this.childDirectories(phasePath, entries, 'Phase').map(child =>
      this.buildField(ctx, path.join(phasePath, child.name), child.entries, {
        patientId: ctx.patientId,
        siteId,
        phaseId,
        fieldId: child.name,
      }),
    );
    return { id: phaseId, path: phasePath, fields };
  }

  private buildField(ctx: BuildContext, fieldPath: string, entries: DirectoryEntry[], owner: NativePath): Field {
    const scope: WarningScope = { ...owner };
    const issues: LoadWarning[] = [];
    const surfaces: Surface[] = [];

    for (const name of directoryNames(entries)) {
      const surfacePath = path.join(fieldPath, name);
      try {
        const { surface, warnings } = ctx.registry.allocate(id => {
          const parsed = this.parser.parse(surfacePath, owner, id);
          if (this.strictMode && parsed.warnings.length > 0) throw parsed.warnings[0];
          return parsed;
        });
        for (const warning of warnings) {
          issues.push(toWarning(warning, scope));
        }
        surfaces.push(surface);
      } catch (error) {
        if (!isSgrtError(error) || this.strictMode) throw error;
        issues.push(toWarning(error, scope));
      }
    }

    for (const issue of issues) {
      this.log.warn(`${issue.kind} at ${issue.path}: ${issue.message}`, 'sgrt-builder');
    }
    ctx.warnings.push(...issues);
    return { id: owner.fieldId, path: fieldPath, surfaces: sortChronologically(surfaces), issues };
  }

  private readDetails(patientDir: string, entries: DirectoryEntry[], ctx: BuildContext): PatientDetails | null {
    const fileName = PATIENT_DETAILS_FILES.find(name => entries.some(e => e.kind === 'file' && e.name === name));
    if (!fileName) return null;

    const detailsPath = path.join(patientDir, fileName);
    try {
      return parsePatientDetails(this.fileSystem.read(detailsPath), detailsPath);
    } catch (error) {
      const warning: LoadWarning = {
        kind: 'MalformedRecord',
        message: `Unreadable patient details: ${errorMessage(error)}`,
        path: detailsPath,
        scope: { patientId: ctx.patientId },
      };
      this.log.warn(warning.message, 'sgrt-builder');
      ctx.warnings.push(warning);
      return null;
    }
  }

  /**
   * Runs a subtree build. An isolable integrity error drops the subtree with a
   * warning, unless strictMode promotes it to a patient-level failure.
   */
  private isolate<T>(ctx: BuildContext, scope: WarningScope, build: () => T): T | null {
    try {
      return build();
    } catch (error) {
      if (error instanceof HierarchyIntegrityError && error.isolable && !this.strictMode) {
        const warning = toWarning(error, scope);
        this.log.warn(`Dropped subtree ${error.path}: ${error.message}`, 'sgrt-builder');
        ctx.warnings.push(warning);
        return null;
      }
      throw error;
    }
  }

  /**
   * Lists every child directory of a Site or Phase. A child that is itself a
   * capture unit means a Surface sits outside any Field.
   */
  private childDirectories(dir: string, entries: DirectoryEntry[], level: 'Site' | 'Phase'): ChildDirectory[] {
    const children = directoryNames(entries).map(name => ({
      name,
      entries: this.listOrThrow(path.join(dir, name), level === 'Site' ? 'Phase' : 'Field'),
    }));
    const stray = children.find(child => isCaptureUnit(child.entries));
    if (stray) {
      throw new HierarchyIntegrityError(
        `Capture unit "${stray.name}" found directly under ${level} (outside any Field)`,
        dir,
        true,
      );
    }
    return children;
  }

  private listOrThrow(dir: string, level: string): DirectoryEntry[] {
    try {
      return this.fileSystem.list(dir);
    } catch (error) {
      throw new HierarchyIntegrityError(`Cannot list ${level} directory: ${errorMessage(error)}`, dir, true, { cause: error });
    }
  }
}

/** Chronological by capture time; undated captures last; ties keep listing order. */
export function sortChronologically(surfaces: Surface[]): Surface[] {
  return surfaces
    .map((surface, order) => ({ surface, order }))
    .sort((a, b) => {
      const ta = a.surface.capturedAt?.getTime();
      const tb = b.surface.capturedAt?.getTime();
      if (ta !== undefined && tb !== undefined && ta !== tb) return ta - tb;
      if (ta !== undefined && tb === undefined) return -1;
      if (ta === undefined && tb !== undefined) return 1;
      return a.order - b.order;
    })
    .map(({ surface }) => surface);
}
