const errorResponse = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

const internalError = errorResponse(
     'Internal server error',
     'INTERNAL_ERROR',
     'An unexpected error occurred'
);

const variantIdParams = {
     type: 'object',
     required: ['variantId'],
     properties: {
          variantId: {
               type: 'integer',
               minimum: 1,
               description: 'Web or legacy warehouse variant id',
               example: 42,
          },
     },
};

export const cartDiagnosticsSchema = {
     tags: ['diagnostics'],
     summary: 'Check every line of a cart against available stock',
     description:
          'Resolves each cart line to a web or legacy warehouse variant and compares it with stock that is assigned and not held by active reservations. All lines are reported, not just the first failure.',
     params: {
          type: 'object',
          required: ['cartId'],
          properties: {
               cartId: { type: 'integer', minimum: 1, example: 7 },
          },
     },
     response: {
          200: {
               description: 'Per-line cart report',
               type: 'object',
               properties: {
                    cartId: { type: 'integer' },
                    valid: { type: 'boolean' },
                    lines: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   cartItemId: { type: 'integer' },
                                   variantId: { type: 'integer' },
                                   requested: { type: 'integer' },
                                   resolvedAs: {
                                        type: 'string',
                                        enum: ['web', 'legacy-warehouse', 'not_found'],
                                   },
                                   stockVariantId: { type: ['integer', 'null'] },
                                   available: { type: ['integer', 'null'] },
                                   status: {
                                        type: 'string',
                                        enum: ['Ok', 'Insufficient', 'OrphanedVariant', 'InactiveVariant'],
                                   },
                              },
                         },
                    },
               },
          },
          500: internalError,
     },
};

export const variantDiagnosticsSchema = {
     tags: ['diagnostics'],
     summary: 'Stock position of a variant',
     params: variantIdParams,
     response: {
          200: {
               description: 'Assigned, reserved and available stock',
               type: 'object',
               properties: {
                    variantId: { type: 'integer' },
                    resolvedAs: { type: 'string', enum: ['web', 'legacy-warehouse'] },
                    stockVariantId: { type: ['integer', 'null'] },
                    isActive: { type: 'boolean' },
                    totalAssigned: { type: 'integer' },
                    reserved: { type: 'integer' },
                    available: { type: 'integer' },
                    perBranch: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   branchId: { type: 'integer' },
                                   quantity: { type: 'integer' },
                              },
                         },
                    },
               },
          },
          404: errorResponse('Variant not found', 'VARIANT_NOT_FOUND', 'Variant 42 not found'),
          500: internalError,
     },
};

export const variantReservationsSchema = {
     tags: ['diagnostics'],
     summary: 'Active reservations holding stock of a variant',
     params: variantIdParams,
     response: {
          200: {
               description: 'Active reservations, soonest expiry first',
               type: 'object',
               properties: {
                    variantId: { type: 'integer' },
                    stockVariantId: { type: ['integer', 'null'] },
                    reservations: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   id: { type: 'integer' },
                                   saleId: { type: 'integer' },
                                   quantity: { type: 'integer' },
                                   reservedAt: { type: 'string', format: 'date-time' },
                                   expiresAt: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          404: errorResponse('Variant not found', 'VARIANT_NOT_FOUND', 'Variant 42 not found'),
          500: internalError,
     },
};
