import swaggerJsdoc from 'swagger-jsdoc';

const historyEntryProperties = {
  book_title: { type: 'string', example: 'Moby-Dick' },
  start_date: { type: 'string', format: 'date', example: '2024-01-01' },
  end_date: { type: 'string', format: 'date', example: '2024-01-10' },
  status: { type: 'string', enum: ['Pending', 'Approved', 'Denied'] },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Library Borrowing API',
      version: '1.0.0',
      description: 'Catalog, date-ranged borrow requests and admin review',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        basicAuth: {
          type: 'http',
          scheme: 'basic',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'BOOK_ALREADY_BORROWED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Book already borrowed during this period',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        Book: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            title: { type: 'string' },
            author: { type: 'string' },
            copies_available: { type: 'integer' },
          },
        },
        HistoryEntry: {
          type: 'object',
          properties: historyEntryProperties,
        },
        BorrowRequest: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            book_id: { type: 'integer' },
            ...historyEntryProperties,
          },
        },
      },
    },
    tags: [
      { name: 'Catalog', description: 'Book catalog' },
      { name: 'Borrowing', description: 'Borrow requests and personal history' },
      { name: 'Admin', description: 'User management and request review' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

let cached: object | undefined;

/**
 * OpenAPI document generated from the `@openapi` blocks in the route modules.
 */
export function buildOpenApiSpec(): object {
  if (!cached) {
    cached = swaggerJsdoc(options);
  }
  return cached;
}
