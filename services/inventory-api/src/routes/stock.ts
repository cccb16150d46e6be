import { FastifyPluginAsync } from 'fastify';
import type { JournalEntry } from '@stockflow/shared/src/types/inventory.types';
import {
     adjustStockSchema,
     getStockSchema,
     journalSchema,
     listStockSchema,
     provisionStockSchema,
     reconciliationSchema,
     stockCheckSchema,
} from '../schemas/stock.schemas';
import { EngineRouteOptions, actorOf, sendError } from './route-helpers';

interface StockKeyParams {
     productId: number;
     locationId: number;
}

export const stockRoutes: FastifyPluginAsync<EngineRouteOptions> = async (app, { engine }) => {
     const { ledger, journal } = engine;

     // Provision a stock entry with its opening quantities
     app.post<{
          Body: { productId: number; locationId: number; onHand: number; reserved?: number };
     }>('/', { schema: provisionStockSchema }, async (request, reply) => {
          const { productId, locationId, onHand, reserved } = request.body;

          try {
               const level = await ledger.provision(productId, locationId, { onHand, reserved }, actorOf(request));
               return reply.code(201).send(level);
          } catch (error) {
               return sendError(reply, error, 'Failed to provision stock entry');
          }
     });

     app.get<{ Params: { productId: number } }>(
          '/:productId',
          { schema: listStockSchema },
          async (request, reply) => {
               try {
                    const levels = await ledger.listForProduct(request.params.productId);
                    return reply.send({
                         productId: request.params.productId,
                         totalOnHand: levels.reduce((sum, level) => sum + level.onHand, 0),
                         totalAvailable: levels.reduce((sum, level) => sum + level.available, 0),
                         levels,
                    });
               } catch (error) {
                    return sendError(reply, error, 'Failed to list stock levels');
               }
          }
     );

     app.get<{ Params: StockKeyParams }>(
          '/:productId/:locationId',
          { schema: getStockSchema },
          async (request, reply) => {
               try {
                    const { productId, locationId } = request.params;
                    return reply.send(await ledger.get(productId, locationId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to get stock level');
               }
          }
     );

     app.post<{
          Params: StockKeyParams;
          Body: { delta: number; kind?: 'adjustment' | 'return'; referenceId: string; notes?: string };
     }>('/:productId/:locationId/adjustments', { schema: adjustStockSchema }, async (request, reply) => {
          const { productId, locationId } = request.params;
          const { delta, kind, referenceId, notes } = request.body;

          try {
               const level = await ledger.adjust(productId, locationId, delta, {
                    kind: kind ?? 'adjustment',
                    referenceKind: 'adjustment',
                    referenceId,
                    actor: actorOf(request),
                    notes,
               });
               return reply.send(level);
          } catch (error) {
               return sendError(reply, error, 'Failed to adjust stock');
          }
     });

     app.post<{ Params: StockKeyParams; Body: { checkedAt?: string } }>(
          '/:productId/:locationId/checks',
          { schema: stockCheckSchema },
          async (request, reply) => {
               const { productId, locationId } = request.params;
               const checkedAt = request.body?.checkedAt ? new Date(request.body.checkedAt) : new Date();

               try {
                    const level = await ledger.recordStockCheck(productId, locationId, checkedAt, actorOf(request));
                    return reply.send(level);
               } catch (error) {
                    return sendError(reply, error, 'Failed to record stock check');
               }
          }
     );

     app.get<{ Params: StockKeyParams; Querystring: { limit?: number } }>(
          '/:productId/:locationId/journal',
          { schema: journalSchema },
          async (request, reply) => {
               const { productId, locationId } = request.params;
               const limit = request.query.limit ?? 100;

               try {
                    const entries: JournalEntry[] = [];
                    for await (const entry of journal.entriesFor(productId, locationId)) {
                         entries.push(entry);
                         if (entries.length >= limit) break;
                    }
                    return reply.send({ entries });
               } catch (error) {
                    return sendError(reply, error, 'Failed to read stock journal');
               }
          }
     );

     app.get<{ Params: StockKeyParams }>(
          '/:productId/:locationId/reconciliation',
          { schema: reconciliationSchema },
          async (request, reply) => {
               try {
                    const { productId, locationId } = request.params;
                    return reply.send(await journal.reconcile(productId, locationId));
               } catch (error) {
                    return sendError(reply, error, 'Failed to reconcile stock entry');
               }
          }
     );
};
