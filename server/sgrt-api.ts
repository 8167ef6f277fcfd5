/**
 * SGRT patient database API
 * Read-only Express routes over a loaded PatientCollection
 */

import { Router, type Request, type Response } from 'express';
import { logger } from './logger';
import { PatientNotFound, type Patient, type PatientCollection } from './sgrt';
import { serializeCalendar, serializeNativeTree } from './sgrt/serialize';

export function createSgrtRouter(collection: PatientCollection): Router {
  const router = Router();

  /**
   * List loaded patients with surface and warning counts
   */
  router.get('/sgrt/patients', (_req: Request, res: Response) => {
    const patients = [...collection].map(patient => ({
      id: patient.id,
      surfaceCount: patient.registry.size,
      treatmentDays: patient.calendar?.days.length ?? 0,
      warningCount: patient.warnings.length,
    }));
    res.json({ roots: collection.roots, patients });
  });

  /**
   * Native Site → Phase → Field → Surface tree for one patient
   */
  router.get('/sgrt/patients/:id', (req: Request, res: Response) => {
    withPatient(collection, req, res, patient => res.json(serializeNativeTree(patient)));
  });

  /**
   * Treatment calendar (days → sessions → surface ids) for one patient
   */
  router.get('/sgrt/patients/:id/calendar', (req: Request, res: Response) => {
    withPatient(collection, req, res, patient => {
      if (!patient.calendar) {
        res.status(409).json({ error: `Calendar not built for ${patient.id}` });
        return;
      }
      res.json(serializeCalendar(patient.calendar));
    });
  });

  /**
   * Per-patient load outcomes, warnings included
   */
  router.get('/sgrt/report', (_req: Request, res: Response) => {
    res.json(collection.report);
  });

  return router;
}

function withPatient(
  collection: PatientCollection,
  req: Request,
  res: Response,
  handle: (patient: Patient) => void,
): void {
  try {
    handle(collection.get(req.params.id));
  } catch (error) {
    if (error instanceof PatientNotFound) {
      res.status(404).json({ error: error.message });
      return;
    }
    logger.error(error, 'sgrt-api');
    res.status(500).json({ error: 'Internal error' });
  }
}
