import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Bouquet Allocation API',
      version: '1.0.0',
      description: `
Allocates a flower inventory to competing bouquet designs.

## Allocation
1. Designs are ranked by how scarce their required flowers are; designs that cannot
   possibly be built are dropped up front.
2. Required flowers are reserved all-or-nothing per design, in rank order.
3. Designs holding all required flowers are topped up with filler of their size.
4. The first design that is still incomplete gives its flowers back and is abandoned,
   and steps 2-4 repeat until every remaining design is complete.

Scarcity never fails a request: abandoned designs are reported with \`completed: false\`.
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      {
        name: 'Allocations',
        description: 'Allocation runs',
      },
    ],
    components: {
      schemas: {
        StockRecord: {
          type: 'object',
          required: ['species', 'size', 'quantity'],
          properties: {
            species: { type: 'string', pattern: '^[a-z]+$', example: 'a' },
            size: { type: 'string', enum: ['L', 'S'] },
            quantity: { type: 'integer', minimum: 0 },
          },
        },
        DesignRecord: {
          type: 'object',
          required: ['name', 'size', 'total', 'required'],
          properties: {
            name: { type: 'string', pattern: '^[A-Z]+$', example: 'A' },
            size: { type: 'string', enum: ['L', 'S'] },
            total: { type: 'integer', minimum: 1, description: 'Flowers in the finished bouquet' },
            required: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  species: { type: 'string', example: 'a' },
                  quantity: { type: 'integer', minimum: 1 },
                },
              },
            },
          },
        },
        BouquetSummary: {
          type: 'object',
          properties: {
            name: { type: 'string' },
            size: { type: 'string', enum: ['L', 'S'] },
            total: { type: 'integer' },
            weight: { type: 'number', description: 'Priority score, 0 when rejected up front' },
            active: { type: 'boolean' },
            completed: { type: 'boolean' },
            deactivationReason: {
              type: 'string',
              enum: ['UNSATISFIABLE', 'RELEASED'],
              nullable: true,
            },
            flowers: {
              type: 'array',
              items: {
                type: 'object',
                properties: {
                  species: { type: 'string' },
                  quantity: { type: 'integer' },
                },
              },
            },
            formatted: { type: 'string', example: 'AL10a15b5c' },
          },
        },
        AllocationReport: {
          type: 'object',
          properties: {
            data: {
              type: 'object',
              properties: {
                bouquets: { type: 'array', items: { $ref: '#/components/schemas/BouquetSummary' } },
                completed: { type: 'array', items: { type: 'string' } },
                remainingStock: { type: 'array', items: { $ref: '#/components/schemas/StockRecord' } },
                passes: { type: 'integer' },
                deactivations: { type: 'integer' },
              },
            },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', description: 'Error code' },
                message: { type: 'string', description: 'Human-readable error message' },
                details: { type: 'object', description: 'Additional error details' },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'], // Path to route files with JSDoc comments
};

export const swaggerSpec = swaggerJsdoc(options);
