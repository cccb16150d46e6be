import {
     documentResponse,
     idParams,
     internalErrorResponse,
     mutationErrors,
     notFoundResponse,
} from './common.schemas';

const transferParams = idParams('Transfer id', '0b7a3c0e-2f1d-4c55-9a53-6f1f2b1f8e21');

export const createTransferSchema = {
     tags: ['transfers'],
     summary: 'Request a stock transfer between two locations',
     description: 'Creates a pending transfer. Stock moves only when the transfer is dispatched.',
     body: {
          type: 'object',
          required: ['productId', 'sourceLocationId', 'destinationLocationId', 'quantity'],
          properties: {
               productId: { type: 'integer', minimum: 1, example: 7 },
               sourceLocationId: { type: 'integer', minimum: 1, example: 3 },
               destinationLocationId: { type: 'integer', minimum: 1, example: 1 },
               quantity: { type: 'integer', minimum: 1, example: 40 },
               notes: { type: 'string', example: 'Rebalance for weekend demand' },
          },
     },
     response: {
          201: documentResponse('Transfer created'),
          ...mutationErrors,
     },
};

export const getTransferSchema = {
     tags: ['transfers'],
     summary: 'Get a transfer',
     params: transferParams,
     response: {
          200: documentResponse('Transfer'),
          404: notFoundResponse,
          500: internalErrorResponse,
     },
};

export const transferActionSchema = (summary: string) => ({
     tags: ['transfers'],
     summary,
     params: transferParams,
     response: {
          200: documentResponse('Transfer after the transition'),
          ...mutationErrors,
     },
});
