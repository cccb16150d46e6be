import { FastifyPluginAsync } from 'fastify';
import type { CreateTransferRequest, Transfer } from '@stockflow/shared/src/types/inventory.types';
import {
     createTransferSchema,
     getTransferSchema,
     transferActionSchema,
} from '../schemas/transfer.schemas';
import { EngineRouteOptions, actorOf, sendError } from './route-helpers';

const TRANSFER_ACTIONS = ['dispatch', 'complete', 'cancel'] as const;
type TransferAction = (typeof TRANSFER_ACTIONS)[number];

const ACTION_SUMMARIES: Record<TransferAction, string> = {
     dispatch: 'Dispatch a pending transfer, debiting the source location',
     complete: 'Complete an in-transit transfer, crediting the destination location',
     cancel: 'Cancel a transfer, crediting the source back when already dispatched',
};

export const transferRoutes: FastifyPluginAsync<EngineRouteOptions> = async (app, { engine }) => {
     const { transfers } = engine;

     app.post<{ Body: CreateTransferRequest }>(
          '/',
          { schema: createTransferSchema },
          async (request, reply) => {
               try {
                    const transfer = await transfers.create(request.body, actorOf(request));
                    return reply.code(201).send(transfer);
               } catch (error) {
                    return sendError(reply, error, 'Failed to create transfer');
               }
          }
     );

     app.get<{ Params: { id: string } }>('/:id', { schema: getTransferSchema }, async (request, reply) => {
          try {
               return reply.send(await transfers.get(request.params.id));
          } catch (error) {
               return sendError(reply, error, 'Failed to get transfer');
          }
     });

     const actions: Record<TransferAction, (id: string, actor: string) => Promise<Transfer>> = {
          dispatch: (id, actor) => transfers.dispatch(id, actor),
          complete: (id, actor) => transfers.complete(id, actor),
          cancel: (id, actor) => transfers.cancel(id, actor),
     };

     for (const action of TRANSFER_ACTIONS) {
          app.post<{ Params: { id: string } }>(
               `/:id/${action}`,
               { schema: transferActionSchema(ACTION_SUMMARIES[action]) },
               async (request, reply) => {
                    try {
                         return reply.send(await actions[action](request.params.id, actorOf(request)));
                    } catch (error) {
                         return sendError(reply, error, `Failed to ${action} transfer`);
                    }
               }
          );
     }
};
