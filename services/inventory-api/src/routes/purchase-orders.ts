import { FastifyPluginAsync } from 'fastify';
import { purchaseOrderTotal } from '@stockflow/shared/src/services/purchase-fulfillment';
import type {
     CreatePurchaseOrderRequest,
     LineReceipt,
     PurchaseLineInput,
     PurchaseOrder,
} from '@stockflow/shared/src/types/inventory.types';
import {
     addPurchaseLineSchema,
     createPurchaseOrderSchema,
     getPurchaseOrderSchema,
     purchaseOrderActionSchema,
     receivePurchaseOrderSchema,
     removePurchaseLineSchema,
     updatePurchaseLineSchema,
} from '../schemas/order.schemas';
import { EngineRouteOptions, actorOf, sendError } from './route-helpers';

const PURCHASE_ORDER_ACTIONS = ['submit', 'approve', 'ship', 'cancel'] as const;
type PurchaseOrderAction = (typeof PURCHASE_ORDER_ACTIONS)[number];

interface LineParams {
     id: string;
     lineId: string;
}

const withTotal = (order: PurchaseOrder) => ({ ...order, total: purchaseOrderTotal(order) });

export const purchaseOrderRoutes: FastifyPluginAsync<EngineRouteOptions> = async (app, { engine }) => {
     const { purchasing } = engine;

     app.post<{ Body: CreatePurchaseOrderRequest }>(
          '/',
          { schema: createPurchaseOrderSchema },
          async (request, reply) => {
               try {
                    const order = await purchasing.createOrder(request.body, actorOf(request));
                    return reply.code(201).send(withTotal(order));
               } catch (error) {
                    return sendError(reply, error, 'Failed to create purchase order');
               }
          }
     );

     app.get<{ Params: { id: string } }>('/:id', { schema: getPurchaseOrderSchema }, async (request, reply) => {
          try {
               return reply.send(withTotal(await purchasing.get(request.params.id)));
          } catch (error) {
               return sendError(reply, error, 'Failed to get purchase order');
          }
     });

     app.post<{ Params: { id: string }; Body: PurchaseLineInput }>(
          '/:id/lines',
          { schema: addPurchaseLineSchema },
          async (request, reply) => {
               try {
                    const order = await purchasing.addLine(request.params.id, request.body, actorOf(request));
                    return reply.code(201).send(withTotal(order));
               } catch (error) {
                    return sendError(reply, error, 'Failed to add purchase order line');
               }
          }
     );

     app.patch<{ Params: LineParams; Body: { quantityOrdered?: number; unitPrice?: number } }>(
          '/:id/lines/:lineId',
          { schema: updatePurchaseLineSchema },
          async (request, reply) => {
               const { id, lineId } = request.params;
               try {
                    const order = await purchasing.updateLine(id, lineId, request.body, actorOf(request));
                    return reply.send(withTotal(order));
               } catch (error) {
                    return sendError(reply, error, 'Failed to update purchase order line');
               }
          }
     );

     app.delete<{ Params: LineParams }>(
          '/:id/lines/:lineId',
          { schema: removePurchaseLineSchema },
          async (request, reply) => {
               const { id, lineId } = request.params;
               try {
                    return reply.send(withTotal(await purchasing.removeLine(id, lineId, actorOf(request))));
               } catch (error) {
                    return sendError(reply, error, 'Failed to remove purchase order line');
               }
          }
     );

     const actions: Record<PurchaseOrderAction, (id: string, actor: string) => Promise<PurchaseOrder>> = {
          submit: (id, actor) => purchasing.submit(id, actor),
          approve: (id, actor) => purchasing.approve(id, actor),
          ship: (id, actor) => purchasing.markShipped(id, actor),
          cancel: (id, actor) => purchasing.cancel(id, actor),
     };

     for (const action of PURCHASE_ORDER_ACTIONS) {
          app.post<{ Params: { id: string } }>(
               `/:id/${action}`,
               { schema: purchaseOrderActionSchema(`Move a purchase order through ${action}`) },
               async (request, reply) => {
                    try {
                         return reply.send(withTotal(await actions[action](request.params.id, actorOf(request))));
                    } catch (error) {
                         return sendError(reply, error, `Failed to ${action} purchase order`);
                    }
               }
          );
     }

     app.post<{ Params: { id: string }; Body: { receipts: LineReceipt[] } }>(
          '/:id/receive',
          { schema: receivePurchaseOrderSchema },
          async (request, reply) => {
               try {
                    const order = await purchasing.receive(request.params.id, request.body.receipts, actorOf(request));
                    return reply.send(withTotal(order));
               } catch (error) {
                    return sendError(reply, error, 'Failed to receive purchase order');
               }
          }
     );
};
