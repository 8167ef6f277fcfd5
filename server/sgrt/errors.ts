import type { LoadWarning, SgrtErrorKind, WarningScope } from '@shared/schema';

/**
 * Base class for every failure raised while loading the SGRT patient database.
 * `kind` mirrors the class so reports can carry it after serialisation.
 */
export abstract class SgrtError extends Error {
  abstract readonly kind: SgrtErrorKind;
  /** Recoverable findings collected before this error stopped the load. */
  warnings: LoadWarning[] = [];

  constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  withWarnings(warnings: readonly LoadWarning[]): this {
    this.warnings = [...warnings];
    return this;
  }
}

/** Capture data that could not be read or is corrupt. */
export class MalformedRecord extends SgrtError {
  readonly kind = 'MalformedRecord' as const;
}

/** No capture time could be determined from the payload or the folder names. */
export class MissingTimestamp extends SgrtError {
  readonly kind = 'MissingTimestamp' as const;
}

/** Expected delta data (payload file or required columns) is absent. */
export class IncompleteRecord extends SgrtError {
  readonly kind = 'IncompleteRecord' as const;
}

/**
 * The directory tree violates the Patient → Site → Phase → Field → Surface nesting.
 * `isolable` is true when dropping the offending subtree leaves a consistent patient.
 */
export class HierarchyIntegrityError extends SgrtError {
  readonly kind = 'HierarchyIntegrityError' as const;

  constructor(message: string, path: string, readonly isolable = false, options?: { cause?: unknown }) {
    super(message, path, options);
  }
}

export class ReprocessingError extends SgrtError {
  readonly kind = 'ReprocessingError' as const;
}

export class PatientNotFound extends SgrtError {
  readonly kind = 'PatientNotFound' as const;

  constructor(readonly patientId: string) {
    super(`Patient not found: ${patientId}`, patientId);
  }
}

export function isSgrtError(error: unknown): error is SgrtError {
  return error instanceof SgrtError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toWarning(error: SgrtError, scope: WarningScope): LoadWarning {
  return {
    kind: error.kind,
    message: error.message,
    path: error.path,
    scope,
  };
}
