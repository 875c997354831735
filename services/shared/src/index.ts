// Database
export * from './db/client';

// Messaging
export * from './messaging/client';

// Services
export * from './services/variant-catalog';
export * from './services/branch-stock-ledger';
export * from './services/reservation-manager';
export * from './services/cart-consistency-checker';

// Types
export * from './types/stock.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/numbers';
export * from './utils/config';
