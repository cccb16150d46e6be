import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import type { StockEngine } from '@stockflow/shared/src/engine';
import { purchaseOrderRoutes } from './routes/purchase-orders';
import { salesOrderRoutes } from './routes/sales-orders';
import { stockRoutes } from './routes/stock';
import { transferRoutes } from './routes/transfers';

export interface AppOptions {
     logger?: boolean;
     docs?: boolean;
}

export async function buildApp(engine: StockEngine, options: AppOptions = {}): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header !== '' ? header : `req-${Date.now()}`;
          },
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     // CORS
     await app.register(cors, {
          origin: true,
     });

     if (options.docs ?? true) {
          // OpenAPI/Swagger
          await app.register(swagger, {
               openapi: {
                    info: {
                         title: 'Stockflow Inventory API',
                         description:
                              'Stock ledger, transfers and order fulfillment. The acting user is read from the X-Actor header.',
                         version: '1.0.0',
                    },
                    servers: [{ url: 'http://localhost:3000', description: 'Development' }],
                    tags: [
                         { name: 'stock', description: 'Stock levels, adjustments and journal' },
                         { name: 'transfers', description: 'Transfers between locations' },
                         { name: 'purchase-orders', description: 'Purchase order workflow and receipts' },
                         { name: 'sales-orders', description: 'Sales order workflow and reservations' },
                         { name: 'health', description: 'Health and readiness checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check against the ledger store',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             store: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    const storeHealthy = await engine.store.ping();
                    if (!storeHealthy) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Ledger store unavailable',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              store: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(stockRoutes, { prefix: '/stock', engine });
     await app.register(transferRoutes, { prefix: '/transfers', engine });
     await app.register(purchaseOrderRoutes, { prefix: '/purchase-orders', engine });
     await app.register(salesOrderRoutes, { prefix: '/sales-orders', engine });

     return app;
}
