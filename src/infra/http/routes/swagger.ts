import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { buildOpenApiSpec } from '../swagger.js';

export function createSwaggerRoutes() {
  const router = Router();

  router.get('/docs.json', (_req, res) => {
    res.json(buildOpenApiSpec());
  });
  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(buildOpenApiSpec(), {
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
