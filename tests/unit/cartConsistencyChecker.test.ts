import {
     CartConsistencyChecker,
     isCartValid,
} from '@webstock/shared/src/services/cart-consistency-checker';
import { createMockClient, queueRows, webVariantRow } from '../helpers/testUtils';

describe('CartConsistencyChecker (Unit)', () => {
     let checker: CartConsistencyChecker;
     let mockClient: ReturnType<typeof createMockClient>;

     beforeEach(() => {
          checker = new CartConsistencyChecker();
          mockClient = createMockClient();
     });

     it('should evaluate every line and reuse availability per stock variant', async () => {
          queueRows(
               mockClient,
               [
                    { id: 1, cart_id: 7, variant_id: 10, quantity: 2 },
                    { id: 2, cart_id: 7, variant_id: 999, quantity: 1 },
                    { id: 3, cart_id: 7, variant_id: 10, quantity: 6 },
               ],
               [webVariantRow({ id: 10 })],
               [{ total: '5' }],
               [{ reserved: '0' }],
               [],
               [],
               [webVariantRow({ id: 10 })]
          );

          const lines = await checker.validateCart(mockClient, 7);

          expect(lines).toEqual([
               {
                    cartItemId: 1,
                    variantId: 10,
                    requested: 2,
                    resolvedAs: 'web',
                    stockVariantId: 10,
                    available: 5,
                    status: 'Ok',
               },
               {
                    cartItemId: 2,
                    variantId: 999,
                    requested: 1,
                    resolvedAs: 'not_found',
                    stockVariantId: null,
                    available: null,
                    status: 'OrphanedVariant',
               },
               {
                    cartItemId: 3,
                    variantId: 10,
                    requested: 6,
                    resolvedAs: 'web',
                    stockVariantId: 10,
                    available: 5,
                    status: 'Insufficient',
               },
          ]);
          expect(mockClient.query).toHaveBeenCalledTimes(7);
          expect(isCartValid(lines)).toBe(false);
     });

     it('should flag inactive web variants without reading stock', async () => {
          queueRows(
               mockClient,
               [{ id: 4, cart_id: 8, variant_id: 11, quantity: 1 }],
               [webVariantRow({ id: 11, is_active: false })]
          );

          const [line] = await checker.validateCart(mockClient, 8);

          expect(line.status).toBe('InactiveVariant');
          expect(line.available).toBeNull();
          expect(mockClient.query).toHaveBeenCalledTimes(2);
     });

     it('should report an unmapped legacy variant as having nothing available', async () => {
          queueRows(
               mockClient,
               [{ id: 5, cart_id: 9, variant_id: 501, quantity: 1 }],
               [],
               [
                    {
                         id: 501,
                         product_id: 9,
                         size_id: 1,
                         color_id: 1,
                         branch_id: 1,
                         quantity: 4,
                         web_variant_id: null,
                    },
               ]
          );

          const [line] = await checker.validateCart(mockClient, 9);

          expect(line).toEqual({
               cartItemId: 5,
               variantId: 501,
               requested: 1,
               resolvedAs: 'legacy-warehouse',
               stockVariantId: null,
               available: 0,
               status: 'Insufficient',
          });
     });

     it('should treat an empty cart as valid', async () => {
          queueRows(mockClient, []);

          const lines = await checker.validateCart(mockClient, 10);

          expect(lines).toEqual([]);
          expect(isCartValid(lines)).toBe(true);
     });
});
