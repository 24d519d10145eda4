import { Router } from 'express';
import { z } from 'zod';
import type { UnitOfWork } from '../../../application/ports.js';
import type { PasswordHasher } from '../../../domain/auth/password.js';
import type { DenyPolicy } from '../../../domain/library/borrowRequest.js';
import { CreateUserUseCase } from '../../../application/auth/createUser.js';
import { ReviewRequestUseCase } from '../../../application/library/reviewRequest.js';
import { LibraryQueries } from '../../../application/library/queries.js';
import { requireAdmin, requireUser } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { idParamsSchema } from './ids.js';
import { toBorrowRequestOut, toHistoryEntryOut } from './presenters.js';

/**
 * @openapi
 * /admin/users:
 *   post:
 *     tags: [Admin]
 *     summary: Create a (non-admin) user
 *     security: [{ basicAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, example: reader@example.com }
 *               password: { type: string, minLength: 6 }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Invalid email, short password or duplicate email
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Caller is not an admin
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/requests:
 *   get:
 *     tags: [Admin]
 *     summary: List every borrow request
 *     security: [{ basicAuth: [] }]
 *     responses:
 *       200:
 *         description: Borrow requests with book titles
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/BorrowRequest' }
 *
 * /admin/requests/{id}:
 *   post:
 *     tags: [Admin]
 *     summary: Approve or deny a borrow request
 *     security: [{ basicAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *       - in: query
 *         name: action
 *         required: true
 *         schema: { type: string, enum: [approve, deny] }
 *     responses:
 *       200: { description: OK }
 *       400:
 *         description: Invalid action, already processed or overlapping approved borrow
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Request not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /admin/users/{id}/history:
 *   get:
 *     tags: [Admin]
 *     summary: A user's borrowing history
 *     security: [{ basicAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: integer }
 *     responses:
 *       200:
 *         description: History entries
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/HistoryEntry' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

// Field rules (email shape, password length) live in the domain so each
// failure gets its own error code; here we only require strings.
const createUserBodySchema = z.object({
  email: z.string(),
  password: z.string(),
});

export interface AdminRouteOptions {
  passwords: PasswordHasher;
  denyPolicy: DenyPolicy;
}

export function createAdminRoutes(uow: UnitOfWork, options: AdminRouteOptions) {
  const router = Router();
  const createUserUseCase = new CreateUserUseCase(uow, options.passwords);
  const reviewRequestUseCase = new ReviewRequestUseCase(uow, options.denyPolicy);
  const queries = new LibraryQueries(uow);

  router.use(requireAdmin);

  router.post(
    '/users',
    validate({ body: createUserBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const result = await createUserUseCase.execute({
        actor: requireUser(req),
        email: body.email,
        password: body.password,
      });
      res.status(201).json({ message: 'User created successfully', user_id: result.userId });
    })
  );

  router.get(
    '/requests',
    asyncHandler(async (req, res) => {
      const requests = await queries.listAllRequests(requireUser(req));
      res.json(requests.map(toBorrowRequestOut));
    })
  );

  router.post(
    '/requests/:id',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const result = await reviewRequestUseCase.execute({
        actor: requireUser(req),
        requestId: id,
        action: req.query.action,
      });
      res.json({ message: `Request ${result.action}d successfully` });
    })
  );

  router.get(
    '/users/:id/history',
    validate({ params: idParamsSchema }),
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const history = await queries.getUserHistory(requireUser(req), id);
      res.json(history.map(toHistoryEntryOut));
    })
  );

  return router;
}
