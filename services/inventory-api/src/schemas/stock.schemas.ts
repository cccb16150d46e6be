import {
     internalErrorResponse,
     mutationErrors,
     notFoundResponse,
} from './common.schemas';

const stockLevelResponse = {
     description: 'Stock level of one product at one location',
     type: 'object',
     properties: {
          productId: { type: 'integer', example: 7 },
          locationId: { type: 'integer', example: 3 },
          onHand: { type: 'integer', example: 250 },
          reserved: { type: 'integer', example: 40 },
          available: { type: 'integer', example: 210 },
          initialOnHand: { type: 'integer', example: 250 },
          lastCheckedAt: { type: 'string', format: 'date-time', nullable: true },
          version: { type: 'integer', example: 3 },
          updatedAt: { type: 'string', format: 'date-time' },
     },
};

const stockKeyParams = {
     type: 'object',
     required: ['productId', 'locationId'],
     properties: {
          productId: { type: 'integer', minimum: 1, description: 'Product id', example: 7 },
          locationId: { type: 'integer', minimum: 1, description: 'Location id', example: 3 },
     },
};

export const provisionStockSchema = {
     tags: ['stock'],
     summary: 'Provision a stock entry',
     description: 'Creates the counter pair for a product at a location with its opening quantities.',
     body: {
          type: 'object',
          required: ['productId', 'locationId', 'onHand'],
          properties: {
               productId: { type: 'integer', minimum: 1, example: 7 },
               locationId: { type: 'integer', minimum: 1, example: 3 },
               onHand: { type: 'integer', minimum: 0, example: 250 },
               reserved: { type: 'integer', minimum: 0, example: 40 },
          },
     },
     response: {
          201: stockLevelResponse,
          ...mutationErrors,
     },
};

export const getStockSchema = {
     tags: ['stock'],
     summary: 'Get stock level',
     params: stockKeyParams,
     response: {
          200: stockLevelResponse,
          404: notFoundResponse,
          500: internalErrorResponse,
     },
};

export const listStockSchema = {
     tags: ['stock'],
     summary: 'List stock levels of a product across locations',
     params: {
          type: 'object',
          required: ['productId'],
          properties: {
               productId: { type: 'integer', minimum: 1, example: 7 },
          },
     },
     response: {
          200: {
               description: 'Stock levels ordered by location',
               type: 'object',
               properties: {
                    productId: { type: 'integer', example: 7 },
                    totalOnHand: { type: 'integer', example: 430 },
                    totalAvailable: { type: 'integer', example: 360 },
                    levels: { type: 'array', items: stockLevelResponse },
               },
          },
          500: internalErrorResponse,
     },
};

export const adjustStockSchema = {
     tags: ['stock'],
     summary: 'Adjust on-hand quantity',
     description: 'Applies a signed delta to on-hand quantity and journals it in the same commit.',
     params: stockKeyParams,
     body: {
          type: 'object',
          required: ['delta', 'referenceId'],
          properties: {
               delta: { type: 'integer', example: -5 },
               kind: {
                    type: 'string',
                    enum: ['adjustment', 'return'],
                    default: 'adjustment',
               },
               referenceId: { type: 'string', example: 'COUNT-2024-0042' },
               notes: { type: 'string', example: 'Damaged in storage' },
          },
     },
     response: {
          200: stockLevelResponse,
          ...mutationErrors,
     },
};

export const stockCheckSchema = {
     tags: ['stock'],
     summary: 'Record a physical stock check',
     params: stockKeyParams,
     body: {
          type: 'object',
          properties: {
               checkedAt: { type: 'string', format: 'date-time' },
          },
     },
     response: {
          200: stockLevelResponse,
          ...mutationErrors,
     },
};

export const journalSchema = {
     tags: ['stock'],
     summary: 'Read the journal of a stock entry',
     params: stockKeyParams,
     querystring: {
          type: 'object',
          properties: {
               limit: { type: 'integer', minimum: 1, maximum: 1000, default: 100 },
          },
     },
     response: {
          200: {
               description: 'Journal entries in insertion order',
               type: 'object',
               properties: {
                    entries: {
                         type: 'array',
                         items: {
                              type: 'object',
                              properties: {
                                   id: { type: 'integer', example: 1 },
                                   productId: { type: 'integer', example: 7 },
                                   locationId: { type: 'integer', example: 3 },
                                   kind: { type: 'string', example: 'transferOut' },
                                   delta: { type: 'integer', example: -40 },
                                   referenceKind: { type: 'string', example: 'transfer' },
                                   referenceId: { type: 'string' },
                                   actor: { type: 'string' },
                                   notes: { type: 'string', nullable: true },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          500: internalErrorResponse,
     },
};

export const reconciliationSchema = {
     tags: ['stock'],
     summary: 'Reconcile a stock entry against its journal',
     params: stockKeyParams,
     response: {
          200: {
               description: 'Reconciliation result',
               type: 'object',
               properties: {
                    productId: { type: 'integer' },
                    locationId: { type: 'integer' },
                    onHand: { type: 'integer' },
                    initialOnHand: { type: 'integer' },
                    journalTotal: { type: 'integer' },
                    balanced: { type: 'boolean' },
               },
          },
          404: notFoundResponse,
          500: internalErrorResponse,
     },
};
