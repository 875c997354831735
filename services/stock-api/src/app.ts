import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { checkConnection } from '@webstock/shared/src/db/client';
import { registerDiagnosticsRoutes } from './routes/diagnostics';

export interface BuildAppOptions {
     logger?: boolean;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
     const app = Fastify({
          logger: options.logger ?? true,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => {
               const header = req.headers['x-correlation-id'];
               return typeof header === 'string' && header.length > 0 ? header : `req-${Date.now()}`;
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

     await app.register(cors, {
          origin: true,
     });

     await app.register(swagger, {
          openapi: {
               info: {
                    title: 'Web Stock Diagnostics API',
                    description:
                         'Read-only view of branch stock, active reservations and cart consistency',
                    version: '1.0.0',
               },
               servers: [{ url: 'http://localhost:3000', description: 'Development' }],
               tags: [
                    { name: 'diagnostics', description: 'Cart and variant stock diagnostics' },
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
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
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
               const dbHealthy = await checkConnection();
               if (!dbHealthy) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: 'Database connection failed',
                    };
               }

               return {
                    status: 'ready',
                    dependencies: {
                         database: 'ok',
                    },
               };
          }
     );

     await app.register(registerDiagnosticsRoutes, { prefix: '/diagnostics' });

     return app;
}
