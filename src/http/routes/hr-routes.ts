import { pipeline } from 'node:stream/promises';

import type { Response, Router } from 'express';
import { Router as createRouter } from 'express';
import { z } from 'zod';

import type { DownstreamDownload } from '../../downstream/downstream-client.js';
import type { HrPortalService } from '../../services/hr-portal-service.js';
import { getAuthContext } from '../middlewares/require-auth.js';
import { memoryUpload, requireUploadedFile } from '../uploads.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const leaveRequestSchema = z.object({
  leave_type_id: z.coerce.number().int().positive(),
  from: isoDate,
  to: isoDate,
  note: z.string().max(2000).nullish()
}).refine((value) => value.to >= value.from, {
  message: "'to' cannot be earlier than 'from'.",
  path: ['to']
});

const expenseSchema = z.object({
  description: z.string().trim().min(1),
  amount: z.coerce.number().positive(),
  date: isoDate
});

const documentUploadSchema = z.object({
  document_type: z.string().trim().min(1)
});

const idParamSchema = z.coerce.number().int().positive();

/**
 * Relays a downstream file to the client. The upstream socket is released
 * when the pipe finishes, fails or the client goes away.
 */
async function streamDownload(response: Response, download: DownstreamDownload): Promise<void> {
  response.status(200);
  response.setHeader('Content-Type', download.contentType);
  response.setHeader('Content-Disposition', download.contentDisposition);
  if (download.contentLength !== null) {
    response.setHeader('Content-Length', String(download.contentLength));
  }

  response.on('close', download.release);

  try {
    await pipeline(download.stream, response);
  } finally {
    download.release();
  }
}

export function createHrRoutes(hrPortalService: HrPortalService): Router {
  const router = createRouter();

  router.get('/leave-types', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.listLeaveTypes(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/leave-requests', async (request, response, next) => {
    try {
      const payload = leaveRequestSchema.parse(request.body);
      const body = await hrPortalService.submitLeaveRequest(getAuthContext(request), {
        leaveTypeId: payload.leave_type_id,
        from: payload.from,
        to: payload.to,
        note: payload.note ?? null
      });
      response.status(201).json(body);
    } catch (error) {
      next(error);
    }
  });

  router.get('/dashboard/pending-leaves-count', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.getPendingLeavesCount(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/dashboard/next-day-off', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.getNextDayOff(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/payslips', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.listPayslips(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/payslips/:payslipId/download', async (request, response, next) => {
    try {
      const payslipId = idParamSchema.parse(request.params.payslipId);
      const download = await hrPortalService.openPayslipDownload(getAuthContext(request), payslipId);
      await streamDownload(response, download);
    } catch (error) {
      next(error);
    }
  });

  router.post('/expenses', memoryUpload.single('receipt'), async (request, response, next) => {
    try {
      const payload = expenseSchema.parse(request.body);
      const body = await hrPortalService.submitExpense(getAuthContext(request), {
        description: payload.description,
        amount: payload.amount,
        date: payload.date,
        receipt: requireUploadedFile(request.file, 'receipt')
      });
      response.status(201).json(body);
    } catch (error) {
      next(error);
    }
  });

  router.get('/documents', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.listDocuments(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/documents', memoryUpload.single('file'), async (request, response, next) => {
    try {
      const payload = documentUploadSchema.parse(request.body);
      const body = await hrPortalService.uploadDocument(
        getAuthContext(request),
        payload.document_type,
        requireUploadedFile(request.file, 'file')
      );
      response.status(201).json(body);
    } catch (error) {
      next(error);
    }
  });

  router.get('/documents/:documentId/download', async (request, response, next) => {
    try {
      const documentId = idParamSchema.parse(request.params.documentId);
      const download = await hrPortalService.openDocumentDownload(getAuthContext(request), documentId);
      await streamDownload(response, download);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/documents/:documentId', async (request, response, next) => {
    try {
      const documentId = idParamSchema.parse(request.params.documentId);
      response.status(200).json(await hrPortalService.deleteDocument(getAuthContext(request), documentId));
    } catch (error) {
      next(error);
    }
  });

  router.get('/attendance/status', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.getAttendanceStatus(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/attendance/check-in', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.checkIn(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/attendance/check-out', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.checkOut(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/attendance/today-log', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.getTodayAttendanceLog(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
