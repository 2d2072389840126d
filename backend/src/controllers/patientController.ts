import { Request, Response } from 'express';
import { z } from 'zod';
import { AppServices } from '../container';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { normalizePhone } from '../utils/phone';

/**
 * Patient Controller
 * Patient directory, keyed by phone
 */

const UpsertPatientSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  phone: z
    .string()
    .trim()
    .refine((value) => normalizePhone(value) !== '', 'phone must contain a phone number'),
  address: z.string().trim().default(''),
  city: z.string().trim().default(''),
  state: z.string().trim().default(''),
  zip: z.string().trim().default(''),
  latitude: z.number().min(-90).max(90).nullable().optional(),
  longitude: z.number().min(-180).max(180).nullable().optional(),
  therapist: z.string().trim().default(''),
  notes: z.string().default(''),
});

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

const IdParamSchema = z.coerce.number().int().positive();

export function createPatientController(services: AppServices) {
  return {
    /**
     * GET /patients?limit=100&offset=0
     */
    listPatients: asyncHandler(async (req: Request, res: Response) => {
      const query = ListQuerySchema.parse(req.query);
      const patients = services.patients.list(query.limit, query.offset);

      res.json({
        status: 'success',
        data: patients,
        count: patients.length,
      });
    }),

    /**
     * GET /patients/:id
     */
    getPatient: asyncHandler(async (req: Request, res: Response) => {
      const id = IdParamSchema.parse(req.params.id);
      const patient = services.patients.getById(id);
      if (!patient) {
        throw new AppError('Patient not found', 404);
      }

      res.json({ status: 'success', data: patient });
    }),

    /**
     * POST /patients
     * Creates the patient, or updates the one already holding this phone number
     */
    upsertPatient: asyncHandler(async (req: Request, res: Response) => {
      const input = UpsertPatientSchema.parse(req.body ?? {});
      const existed = services.patients.findByPhone(input.phone) !== null;
      const patient = await services.patients.upsert(input);

      res.status(existed ? 200 : 201).json({
        status: 'success',
        created: !existed,
        data: patient,
      });
    }),
  };
}
