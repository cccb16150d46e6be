export const errorResponse = (description: string, code: string, message: string) => ({
     description,
     type: 'object',
     properties: {
          error: { type: 'string', example: code },
          message: { type: 'string', example: message },
     },
});

export const badRequestResponse = errorResponse(
     'Invalid request',
     'INVALID_QUANTITY',
     'Transfer quantity must be a positive integer, got 0'
);

export const notFoundResponse = errorResponse(
     'Entity not found',
     'UNKNOWN_ENTITY',
     'Unknown stock entry 7:3'
);

export const conflictResponse = errorResponse(
     'Operation conflicts with current state',
     'INSUFFICIENT_AVAILABLE',
     'Insufficient available quantity for product 7 at location 3: requested 500, available 210'
);

export const internalErrorResponse = errorResponse(
     'Internal server error',
     'INTERNAL_ERROR',
     'An unexpected error occurred'
);

export const documentResponse = (description: string) => ({
     description,
     type: 'object',
     additionalProperties: true,
});

export const idParams = (description: string, example: string) => ({
     type: 'object',
     required: ['id'],
     properties: {
          id: { type: 'string', description, example },
     },
});

/** Standard error responses of a mutating route. */
export const mutationErrors = {
     400: badRequestResponse,
     404: notFoundResponse,
     409: conflictResponse,
     500: internalErrorResponse,
};
