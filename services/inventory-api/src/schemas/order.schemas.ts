import {
     documentResponse,
     idParams,
     internalErrorResponse,
     mutationErrors,
     notFoundResponse,
} from './common.schemas';

const purchaseOrderParams = idParams('Purchase order id', 'PO-2024-0001');
const salesOrderParams = idParams('Sales order id', 'SO-2024-0001');

const lineParams = (description: string) => ({
     type: 'object',
     required: ['id', 'lineId'],
     properties: {
          id: { type: 'string', description },
          lineId: { type: 'string', description: 'Line id' },
     },
});

const purchaseLine = {
     type: 'object',
     required: ['id', 'productId', 'quantityOrdered', 'unitPrice'],
     properties: {
          id: { type: 'string', example: 'L1' },
          productId: { type: 'integer', minimum: 1, example: 7 },
          quantityOrdered: { type: 'integer', minimum: 1, example: 100 },
          unitPrice: { type: 'number', minimum: 0, example: 4.25 },
     },
};

const salesLine = {
     type: 'object',
     required: ['id', 'productId', 'quantity', 'unitPrice'],
     properties: {
          id: { type: 'string', example: 'L1' },
          productId: { type: 'integer', minimum: 1, example: 7 },
          quantity: { type: 'integer', minimum: 1, example: 3 },
          unitPrice: { type: 'number', minimum: 0, example: 9.99 },
          locationId: { type: 'integer', minimum: 1, description: 'Pins the line to a location' },
     },
};

// Purchase orders

export const createPurchaseOrderSchema = {
     tags: ['purchase-orders'],
     summary: 'Create a draft purchase order',
     body: {
          type: 'object',
          required: ['id', 'supplierId', 'lines'],
          properties: {
               id: { type: 'string', example: 'PO-2024-0001' },
               supplierId: { type: 'integer', minimum: 1, example: 12 },
               orderDate: { type: 'string', format: 'date' },
               expectedDeliveryDate: { type: 'string', format: 'date' },
               notes: { type: 'string' },
               lines: { type: 'array', items: purchaseLine },
          },
     },
     response: {
          201: documentResponse('Purchase order created'),
          ...mutationErrors,
     },
};

export const getPurchaseOrderSchema = {
     tags: ['purchase-orders'],
     summary: 'Get a purchase order with its total',
     params: purchaseOrderParams,
     response: {
          200: documentResponse('Purchase order'),
          404: notFoundResponse,
          500: internalErrorResponse,
     },
};

export const purchaseOrderActionSchema = (summary: string) => ({
     tags: ['purchase-orders'],
     summary,
     params: purchaseOrderParams,
     response: {
          200: documentResponse('Purchase order after the transition'),
          ...mutationErrors,
     },
});

export const addPurchaseLineSchema = {
     tags: ['purchase-orders'],
     summary: 'Add a line to a draft purchase order',
     params: purchaseOrderParams,
     body: purchaseLine,
     response: {
          201: documentResponse('Purchase order with the new line'),
          ...mutationErrors,
     },
};

export const updatePurchaseLineSchema = {
     tags: ['purchase-orders'],
     summary: 'Change quantity or price of a draft purchase order line',
     params: lineParams('Purchase order id'),
     body: {
          type: 'object',
          minProperties: 1,
          properties: {
               quantityOrdered: { type: 'integer', minimum: 1 },
               unitPrice: { type: 'number', minimum: 0 },
          },
     },
     response: {
          200: documentResponse('Purchase order with the updated line'),
          ...mutationErrors,
     },
};

export const removePurchaseLineSchema = {
     tags: ['purchase-orders'],
     summary: 'Remove a line from a draft purchase order',
     params: lineParams('Purchase order id'),
     response: {
          200: documentResponse('Purchase order without the line'),
          ...mutationErrors,
     },
};

export const receivePurchaseOrderSchema = {
     tags: ['purchase-orders'],
     summary: 'Receive goods against a shipped purchase order',
     description: 'Credits each receiving location and records the received quantity per line.',
     params: purchaseOrderParams,
     body: {
          type: 'object',
          required: ['receipts'],
          properties: {
               receipts: {
                    type: 'array',
                    minItems: 1,
                    items: {
                         type: 'object',
                         required: ['lineId', 'quantity', 'locationId'],
                         properties: {
                              lineId: { type: 'string', example: 'L1' },
                              quantity: { type: 'integer', minimum: 1, example: 60 },
                              locationId: { type: 'integer', minimum: 1, example: 1 },
                         },
                    },
               },
          },
     },
     response: {
          200: documentResponse('Purchase order after the receipt'),
          ...mutationErrors,
     },
};

// Sales orders

export const createSalesOrderSchema = {
     tags: ['sales-orders'],
     summary: 'Create a pending sales order',
     body: {
          type: 'object',
          required: ['id', 'lines'],
          properties: {
               id: { type: 'string', example: 'SO-2024-0001' },
               customerId: { type: 'integer', minimum: 1, example: 501 },
               orderDate: { type: 'string', format: 'date' },
               notes: { type: 'string' },
               lines: { type: 'array', items: salesLine },
          },
     },
     response: {
          201: documentResponse('Sales order created'),
          ...mutationErrors,
     },
};

export const getSalesOrderSchema = {
     tags: ['sales-orders'],
     summary: 'Get a sales order with its total and reservations',
     params: salesOrderParams,
     response: {
          200: documentResponse('Sales order'),
          404: notFoundResponse,
          500: internalErrorResponse,
     },
};

export const salesOrderActionSchema = (summary: string) => ({
     tags: ['sales-orders'],
     summary,
     params: salesOrderParams,
     response: {
          200: documentResponse('Sales order after the transition'),
          ...mutationErrors,
     },
});

export const addSalesLineSchema = {
     tags: ['sales-orders'],
     summary: 'Add a line to a pending sales order',
     params: salesOrderParams,
     body: salesLine,
     response: {
          201: documentResponse('Sales order with the new line'),
          ...mutationErrors,
     },
};

export const updateSalesLineSchema = {
     tags: ['sales-orders'],
     summary: 'Change a pending sales order line',
     params: lineParams('Sales order id'),
     body: {
          type: 'object',
          minProperties: 1,
          properties: {
               quantity: { type: 'integer', minimum: 1 },
               unitPrice: { type: 'number', minimum: 0 },
               locationId: { type: 'integer', minimum: 1 },
          },
     },
     response: {
          200: documentResponse('Sales order with the updated line'),
          ...mutationErrors,
     },
};

export const removeSalesLineSchema = {
     tags: ['sales-orders'],
     summary: 'Remove a line from a pending sales order',
     params: lineParams('Sales order id'),
     response: {
          200: documentResponse('Sales order without the line'),
          ...mutationErrors,
     },
};
