import { createChildLogger, logger } from '@webstock/shared/src/utils/logger';

describe('Logger', () => {
     it('should honour LOG_LEVEL', () => {
          expect(logger.level).toBe('silent');
     });

     it('should have standard logging methods', () => {
          expect(logger.info).toBeDefined();
          expect(logger.error).toBeDefined();
          expect(logger.warn).toBeDefined();
          expect(logger.debug).toBeDefined();
     });

     it('should handle structured logging with objects', () => {
          const spy = jest.spyOn(logger, 'info');
          logger.info({ variantId: 10, quantity: 2 }, 'Stock reserved');
          expect(spy).toHaveBeenCalledWith({ variantId: 10, quantity: 2 }, 'Stock reserved');
          spy.mockRestore();
     });

     it('should handle error objects', () => {
          const spy = jest.spyOn(logger, 'error');
          const error = new Error('Test error');
          logger.error({ err: error }, 'An error occurred');
          expect(spy).toHaveBeenCalledWith({ err: error }, 'An error occurred');
          spy.mockRestore();
     });

     it('should create child loggers that carry bindings', () => {
          const child = createChildLogger({ saleId: 100 });
          expect(child.bindings()).toEqual(expect.objectContaining({ saleId: 100 }));
          expect(child.level).toBe('silent');
     });
});
