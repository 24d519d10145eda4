import { Router } from 'express';
import { z } from 'zod';
import type { UnitOfWork } from '../../../application/ports.js';
import { SubmitRequestUseCase } from '../../../application/library/submitRequest.js';
import { LibraryQueries } from '../../../application/library/queries.js';
import { isIsoDate } from '../../../domain/library/borrowRequest.js';
import { requireUser } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { rowId } from './ids.js';
import { toBookOut, toHistoryEntryOut } from './presenters.js';

/**
 * @openapi
 * /books:
 *   get:
 *     tags: [Catalog]
 *     summary: List the catalog
 *     security: [{ basicAuth: [] }]
 *     responses:
 *       200:
 *         description: All books
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/Book' }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /requests:
 *   post:
 *     tags: [Borrowing]
 *     summary: Submit a borrow request
 *     security: [{ basicAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [book_id, start_date, end_date]
 *             properties:
 *               book_id: { type: integer, example: 1 }
 *               start_date: { type: string, format: date, example: '2024-01-01' }
 *               end_date: { type: string, format: date, example: '2024-01-10' }
 *     responses:
 *       201:
 *         description: Request created as Pending
 *       400:
 *         description: Validation error, no copies available or overlapping approved borrow
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Invalid credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Book not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /history:
 *   get:
 *     tags: [Borrowing]
 *     summary: The caller's borrowing history
 *     security: [{ basicAuth: [] }]
 *     responses:
 *       200:
 *         description: History entries
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/HistoryEntry' }
 *
 * /download-history:
 *   get:
 *     tags: [Borrowing]
 *     summary: The caller's borrowing history as CSV text
 *     security: [{ basicAuth: [] }]
 *     responses:
 *       200:
 *         description: CSV wrapped in JSON
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 csv: { type: string }
 */

const isoDate = z.string().refine(isIsoDate, { message: 'Expected an ISO date (YYYY-MM-DD)' });

const submitRequestBodySchema = z.object({
  book_id: rowId,
  start_date: isoDate,
  end_date: isoDate,
});

export function createLibraryRoutes(uow: UnitOfWork) {
  const router = Router();
  const submitRequestUseCase = new SubmitRequestUseCase(uow);
  const queries = new LibraryQueries(uow);

  router.get(
    '/books',
    asyncHandler(async (_req, res) => {
      const books = await queries.listBooks();
      res.json(books.map(toBookOut));
    })
  );

  router.post(
    '/requests',
    validate({ body: submitRequestBodySchema }),
    asyncHandler(async (req, res) => {
      const body = submitRequestBodySchema.parse(req.body);
      const result = await submitRequestUseCase.execute({
        actor: requireUser(req),
        bookId: body.book_id,
        startDate: body.start_date,
        endDate: body.end_date,
      });
      res.status(201).json({
        message: 'Request submitted successfully',
        request_id: result.requestId,
      });
    })
  );

  router.get(
    '/history',
    asyncHandler(async (req, res) => {
      const history = await queries.getOwnHistory(requireUser(req));
      res.json(history.map(toHistoryEntryOut));
    })
  );

  router.get(
    '/download-history',
    asyncHandler(async (req, res) => {
      const csv = await queries.exportOwnHistoryCsv(requireUser(req));
      res.json({ csv });
    })
  );

  return router;
}
