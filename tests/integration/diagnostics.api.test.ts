import type { FastifyInstance } from 'fastify';
import type { PoolClient } from 'pg';
import { buildApp } from '../../services/stock-api/src/app';
import { checkConnection, withConnection } from '@webstock/shared/src/db/client';
import { ReservationManager } from '@webstock/shared/src/services/reservation-manager';
import type { Reservation } from '@webstock/shared/src/types/stock.types';
import { FakeStockDb } from '../helpers/fakeStockDb';

const mockDb = new FakeStockDb();

jest.mock('@webstock/shared/src/db/client', () => ({
     withConnection: jest.fn((fn: (client: PoolClient) => Promise<unknown>) => mockDb.transaction(fn)),
     checkConnection: jest.fn().mockResolvedValue(true),
}));

describe('Stock API - Diagnostics', () => {
     let app: FastifyInstance;
     let held: Reservation;
     const cartItems: number[] = [];

     beforeAll(async () => {
          mockDb.addWebVariant(1);
          mockDb.setAssignment(1, 1, 5);
          mockDb.setAssignment(1, 2, 3);
          mockDb.addWarehouseVariant(700, { productId: 1 });
          mockDb.addWarehouseVariant(701, { productId: 50 });

          const manager = new ReservationManager();
          held = await mockDb.transaction((client) =>
               manager.reserve(client, { saleId: 100, variantId: 1, quantity: 2 })
          );

          cartItems.push(mockDb.addCartItem(5, 1, 2));
          cartItems.push(mockDb.addCartItem(5, 999, 1));
          cartItems.push(mockDb.addCartItem(6, 700, 1));

          app = await buildApp({ logger: false });
          await app.ready();
     });

     afterAll(async () => {
          await app.close();
     });

     describe('health', () => {
          it('should report ok', async () => {
               const response = await app.inject({ method: 'GET', url: '/health' });

               expect(response.statusCode).toBe(200);
               expect(response.json().status).toBe('ok');
          });

          it('should report ready when the database answers', async () => {
               const response = await app.inject({ method: 'GET', url: '/health/ready' });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({ status: 'ready', dependencies: { database: 'ok' } });
          });

          it('should report not ready when the database is down', async () => {
               jest.mocked(checkConnection).mockResolvedValueOnce(false);

               const response = await app.inject({ method: 'GET', url: '/health/ready' });

               expect(response.statusCode).toBe(503);
               expect(response.json()).toEqual({
                    status: 'not_ready',
                    error: 'Database connection failed',
               });
          });
     });

     describe('GET /diagnostics/variants/:variantId', () => {
          it('should return the stock position of a web variant', async () => {
               const response = await app.inject({ method: 'GET', url: '/diagnostics/variants/1' });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({
                    variantId: 1,
                    resolvedAs: 'web',
                    stockVariantId: 1,
                    isActive: true,
                    totalAssigned: 8,
                    reserved: 2,
                    available: 6,
                    perBranch: [
                         { branchId: 1, quantity: 5 },
                         { branchId: 2, quantity: 3 },
                    ],
               });
          });

          it('should report a legacy id against its web variant', async () => {
               const response = await app.inject({ method: 'GET', url: '/diagnostics/variants/700' });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual(
                    expect.objectContaining({
                         variantId: 700,
                         resolvedAs: 'legacy-warehouse',
                         stockVariantId: 1,
                         available: 6,
                    })
               );
          });

          it('should report zero stock for a legacy id with no web counterpart', async () => {
               const response = await app.inject({ method: 'GET', url: '/diagnostics/variants/701' });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({
                    variantId: 701,
                    resolvedAs: 'legacy-warehouse',
                    stockVariantId: null,
                    isActive: true,
                    totalAssigned: 0,
                    reserved: 0,
                    available: 0,
                    perBranch: [],
               });
          });

          it('should return 404 for an unknown variant', async () => {
               const response = await app.inject({ method: 'GET', url: '/diagnostics/variants/999' });

               expect(response.statusCode).toBe(404);
               expect(response.json()).toEqual({
                    error: 'VARIANT_NOT_FOUND',
                    message: 'Variant 999 not found',
               });
          });

          it('should reject a non-numeric id', async () => {
               const response = await app.inject({ method: 'GET', url: '/diagnostics/variants/abc' });

               expect(response.statusCode).toBe(400);
          });

          it('should hide unexpected failures behind INTERNAL_ERROR', async () => {
               jest.mocked(withConnection).mockRejectedValueOnce(new Error('pool exhausted'));

               const response = await app.inject({ method: 'GET', url: '/diagnostics/variants/1' });

               expect(response.statusCode).toBe(500);
               expect(response.json()).toEqual({
                    error: 'INTERNAL_ERROR',
                    message: 'An unexpected error occurred',
               });
          });
     });

     describe('GET /diagnostics/variants/:variantId/reservations', () => {
          it('should list active reservations', async () => {
               const response = await app.inject({
                    method: 'GET',
                    url: '/diagnostics/variants/1/reservations',
               });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({
                    variantId: 1,
                    stockVariantId: 1,
                    reservations: [
                         {
                              id: held.id,
                              saleId: 100,
                              quantity: 2,
                              reservedAt: held.reservedAt.toISOString(),
                              expiresAt: held.expiresAt.toISOString(),
                         },
                    ],
               });
          });
     });

     describe('GET /diagnostics/carts/:cartId', () => {
          it('should report every line of an invalid cart', async () => {
               const response = await app.inject({ method: 'GET', url: '/diagnostics/carts/5' });

               expect(response.statusCode).toBe(200);
               expect(response.json()).toEqual({
                    cartId: 5,
                    valid: false,
                    lines: [
                         {
                              cartItemId: cartItems[0],
                              variantId: 1,
                              requested: 2,
                              resolvedAs: 'web',
                              stockVariantId: 1,
                              available: 6,
                              status: 'Ok',
                         },
                         {
                              cartItemId: cartItems[1],
                              variantId: 999,
                              requested: 1,
                              resolvedAs: 'not_found',
                              stockVariantId: null,
                              available: null,
                              status: 'OrphanedVariant',
                         },
                    ],
               });
          });

          it('should mark a fulfillable cart valid', async () => {
               const response = await app.inject({ method: 'GET', url: '/diagnostics/carts/6' });

               expect(response.statusCode).toBe(200);
               expect(response.json().valid).toBe(true);
               expect(response.json().lines).toHaveLength(1);
          });
     });
});
