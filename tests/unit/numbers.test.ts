import { isNonNegativeInteger, isPositiveInteger, toInt } from '@webstock/shared/src/utils/numbers';

describe('numbers', () => {
     describe('toInt', () => {
          it('should parse aggregate strings returned by PostgreSQL', () => {
               expect(toInt('42')).toBe(42);
               expect(toInt(7)).toBe(7);
          });

          it('should treat missing values as zero', () => {
               expect(toInt(null)).toBe(0);
               expect(toInt(undefined)).toBe(0);
          });
     });

     it('should recognise positive integers', () => {
          expect(isPositiveInteger(1)).toBe(true);
          expect(isPositiveInteger(0)).toBe(false);
          expect(isPositiveInteger(-3)).toBe(false);
          expect(isPositiveInteger(1.5)).toBe(false);
     });

     it('should recognise non-negative integers', () => {
          expect(isNonNegativeInteger(0)).toBe(true);
          expect(isNonNegativeInteger(5)).toBe(true);
          expect(isNonNegativeInteger(-1)).toBe(false);
          expect(isNonNegativeInteger(Number.NaN)).toBe(false);
     });
});
