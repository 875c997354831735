import { FastifyInstance, FastifyReply } from 'fastify';
import { PoolClient } from 'pg';
import { withConnection } from '@webstock/shared/src/db/client';
import { BranchStockLedger } from '@webstock/shared/src/services/branch-stock-ledger';
import {
     CartConsistencyChecker,
     isCartValid,
} from '@webstock/shared/src/services/cart-consistency-checker';
import { ReservationManager } from '@webstock/shared/src/services/reservation-manager';
import { VariantCatalog } from '@webstock/shared/src/services/variant-catalog';
import type { VariantResolution } from '@webstock/shared/src/types/stock.types';
import { DomainError, VariantNotFoundError } from '@webstock/shared/src/utils/errors';
import { logger } from '@webstock/shared/src/utils/logger';
import {
     cartDiagnosticsSchema,
     variantDiagnosticsSchema,
     variantReservationsSchema,
} from '../schemas/diagnostics.schemas';

type FoundResolution = Exclude<VariantResolution, { kind: 'not_found' }>;

function sendError(reply: FastifyReply, error: unknown, context: string) {
     if (error instanceof DomainError) {
          return reply.code(error.statusCode).send({
               error: error.code,
               message: error.message,
          });
     }

     logger.error({ error }, context);
     return reply.code(500).send({
          error: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
     });
}

export async function registerDiagnosticsRoutes(app: FastifyInstance) {
     // Built at registration so a bad setting fails server startup
     const catalog = new VariantCatalog();
     const ledger = new BranchStockLedger();
     const reservations = new ReservationManager({ ledger, catalog });
     const checker = new CartConsistencyChecker({ catalog, reservations });

     async function resolveOrThrow(client: PoolClient, variantId: number): Promise<FoundResolution> {
          const resolution = await catalog.resolve(client, variantId);
          if (resolution.kind === 'not_found') {
               throw new VariantNotFoundError(variantId);
          }
          return resolution;
     }

     app.get<{ Params: { cartId: number } }>(
          '/carts/:cartId',
          { schema: cartDiagnosticsSchema },
          async (request, reply) => {
               const { cartId } = request.params;

               try {
                    const lines = await withConnection((client) => checker.validateCart(client, cartId));
                    return reply.send({ cartId, valid: isCartValid(lines), lines });
               } catch (error) {
                    return sendError(reply, error, 'Failed to validate cart');
               }
          }
     );

     app.get<{ Params: { variantId: number } }>(
          '/variants/:variantId',
          { schema: variantDiagnosticsSchema },
          async (request, reply) => {
               const { variantId } = request.params;

               try {
                    const body = await withConnection(async (client) => {
                         const resolution = await resolveOrThrow(client, variantId);
                         const stockVariantId = resolution.stockVariantId;
                         const isActive = resolution.kind === 'web' ? resolution.variant.isActive : true;

                         if (stockVariantId === null) {
                              return {
                                   variantId,
                                   resolvedAs: resolution.kind,
                                   stockVariantId,
                                   isActive,
                                   totalAssigned: 0,
                                   reserved: 0,
                                   available: 0,
                                   perBranch: [],
                              };
                         }

                         const totalAssigned = await ledger.totalAssigned(client, stockVariantId);
                         const reserved = await reservations.activeReservedQuantity(client, stockVariantId);
                         const perBranch = await ledger.perBranch(client, stockVariantId);

                         return {
                              variantId,
                              resolvedAs: resolution.kind,
                              stockVariantId,
                              isActive,
                              totalAssigned,
                              reserved,
                              available: totalAssigned - reserved,
                              perBranch,
                         };
                    });

                    return reply.send(body);
               } catch (error) {
                    return sendError(reply, error, 'Failed to load variant stock');
               }
          }
     );

     app.get<{ Params: { variantId: number } }>(
          '/variants/:variantId/reservations',
          { schema: variantReservationsSchema },
          async (request, reply) => {
               const { variantId } = request.params;

               try {
                    const body = await withConnection(async (client) => {
                         const { stockVariantId } = await resolveOrThrow(client, variantId);
                         const active =
                              stockVariantId === null
                                   ? []
                                   : await reservations.listActiveForVariant(client, stockVariantId);

                         return {
                              variantId,
                              stockVariantId,
                              reservations: active.map((r) => ({
                                   id: r.id,
                                   saleId: r.saleId,
                                   quantity: r.quantity,
                                   reservedAt: r.reservedAt.toISOString(),
                                   expiresAt: r.expiresAt.toISOString(),
                              })),
                         };
                    });

                    return reply.send(body);
               } catch (error) {
                    return sendError(reply, error, 'Failed to list reservations');
               }
          }
     );
}
