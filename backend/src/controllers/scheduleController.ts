import { Request, Response } from 'express';
import { fromZonedTime } from 'date-fns-tz';
import { z } from 'zod';
import { AppServices } from '../container';
import { AppError, asyncHandler } from '../middleware/errorHandler';
import { parseAppointmentTime, DEFAULT_DURATION_MINUTES } from '../services/timeParser';
import { APPOINTMENT_STATUSES } from '../types/domain';
import { isValidDay } from '../utils/date';

/**
 * Schedule Controller
 * Day view, route optimization and direct appointment writes
 */

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const dayField = z
  .string()
  .trim()
  .refine(isValidDay, 'date must be a valid YYYY-MM-DD day');

const ScheduleQuerySchema = z.object({
  date: dayField.optional(),
  therapist: z.string().trim().optional(),
  optimize: z.enum(['true', 'false', '1', '0']).optional(),
});

const OptimizeBodySchema = z.object({
  date: dayField.optional(),
  therapist: z.string().trim().optional(),
});

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

const CreateAppointmentSchema = z
  .object({
    patient_id: z.number().int().positive().optional(),
    phone: z.string().trim().min(1).optional(),
    start: z.string().trim().min(1).optional(),
    text: z.string().trim().min(1).optional(),
    therapist: z.string().trim().optional(),
    duration_minutes: z.number().int().positive().max(24 * 60).optional(),
    status: z.enum(APPOINTMENT_STATUSES).default('pending'),
    note: z.string().default(''),
  })
  .refine((body) => body.patient_id !== undefined || body.phone !== undefined, {
    message: 'patient_id or phone is required',
    path: ['patient_id'],
  })
  .refine((body) => body.start !== undefined || body.text !== undefined, {
    message: 'start or text is required',
    path: ['start'],
  });

const UpdateStatusSchema = z.object({
  status: z.enum(APPOINTMENT_STATUSES),
});

const IdParamSchema = z.coerce.number().int().positive();

export function createScheduleController(services: AppServices) {
  const { config } = services;

  /**
   * Local wall-clock strings ("2024-01-05T10:00") are read in the clinic's zone;
   * strings with an offset are taken as-is.
   */
  function parseStart(value: string): Date {
    const start = OFFSET_SUFFIX.test(value) ? new Date(value) : fromZonedTime(value, config.timeZone);
    if (Number.isNaN(start.getTime())) {
      throw new AppError('start must be an ISO-8601 date-time', 400);
    }
    return start;
  }

  return {
    /**
     * GET /schedule?date=2024-01-05&therapist=Kim&optimize=true
     */
    getSchedule: asyncHandler(async (req: Request, res: Response) => {
      const query = ScheduleQuerySchema.parse(req.query);
      const date = query.date || services.schedule.today(services.now());
      const optimize = query.optimize === 'true' || query.optimize === '1';

      const day = await services.schedule.getDay(date, query.therapist || undefined, { optimize });

      res.json({ status: 'ok', ...day });
    }),

    /**
     * POST /schedule/optimize
     */
    optimizeSchedule: asyncHandler(async (req: Request, res: Response) => {
      const body = OptimizeBodySchema.parse(req.body ?? {});
      const date = body.date || services.schedule.today(services.now());

      const day = await services.schedule.getDay(date, body.therapist || undefined, { optimize: true });

      res.json({ status: 'ok', ok: true, ...day });
    }),

    /**
     * POST /appointments
     * Direct scheduling; same day-scoped upsert as inbound messages
     */
    createAppointment: asyncHandler(async (req: Request, res: Response) => {
      const body = CreateAppointmentSchema.parse(req.body ?? {});

      const patient =
        body.patient_id !== undefined
          ? services.patients.getById(body.patient_id)
          : services.patients.findByPhone(body.phone ?? '');
      if (!patient) {
        throw new AppError('Patient not found', 404);
      }

      let start: Date;
      let durationMinutes = body.duration_minutes;
      if (body.start) {
        start = parseStart(body.start);
      } else {
        const parsed = parseAppointmentTime(body.text, services.now(), config.timeZone);
        if (parsed.status !== 'ok' || !parsed.start) {
          throw new AppError(`Could not read a time from text (${parsed.status})`, 400, {
            status: parsed.status,
          });
        }
        start = parsed.start;
        durationMinutes = durationMinutes ?? parsed.durationMinutes ?? undefined;
      }

      const result = services.appointments.upsertForDay({
        patientId: patient.id,
        therapist: body.therapist || patient.therapist,
        start,
        durationMinutes: durationMinutes ?? DEFAULT_DURATION_MINUTES,
        status: body.status,
        source: 'manual',
        note: body.note,
      });

      res.status(result.created ? 201 : 200).json({
        status: 'success',
        created: result.created,
        data: result.appointment,
      });
    }),

    /**
     * PUT /appointments/:id/status
     */
    updateAppointmentStatus: asyncHandler(async (req: Request, res: Response) => {
      const id = IdParamSchema.parse(req.params.id);
      const body = UpdateStatusSchema.parse(req.body ?? {});

      const appointment = services.appointments.updateStatus(id, body.status);
      if (!appointment) {
        throw new AppError('Appointment not found', 404);
      }

      res.json({ status: 'success', data: appointment });
    }),
  };
}
