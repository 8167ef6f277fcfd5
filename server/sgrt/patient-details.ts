import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MalformedRecord } from './errors';
import { parseFlexibleTimestamp } from './time';
import type { PatientDetails } from './types';

export const PATIENT_DETAILS_FILES = ['Patient Details.vpax', 'Patient_Details.vpax'];

const xml = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function text(node: Record<string, unknown>, tag: string): string | undefined {
  const value = node[tag];
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Parses a patient details .vpax document. The root element is the patient; its
 * direct children carry the demographic tags. Nested Sites/Phases/Fields in the
 * document are ignored, the directory tree is authoritative.
 */
export function parsePatientDetails(bytes: Uint8Array, sourcePath: string): PatientDetails {
  const source = Buffer.from(bytes).toString('utf8').replace(/^\uFEFF/, '');
  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    throw new MalformedRecord(`Invalid patient details XML: ${validation.err.msg}`, sourcePath);
  }

  const document: unknown = xml.parse(source);
  const root = isRecord(document) ? Object.values(document).find(isRecord) : undefined;
  if (!root) {
    throw new MalformedRecord('Patient details document has no root element', sourcePath);
  }

  const isFromDicom = text(root, 'IsFromDicom');
  const dob = parseFlexibleTimestamp(text(root, 'DOB'));

  return {
    guid: text(root, 'GUID'),
    description: text(root, 'Description'),
    isFromDicom: isFromDicom === 'true' ? true : isFromDicom === 'false' ? false : undefined,
    firstName: text(root, 'FirstName'),
    middleName: text(root, 'MiddleName'),
    surname: text(root, 'Surname'),
    patientId: text(root, 'PatientID'),
    patientVersion: text(root, 'PatientVersion'),
    notes: text(root, 'Notes'),
    sex: text(root, 'Sex'),
    dateOfBirth: dob ?? undefined,
  };
}
