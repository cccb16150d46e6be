import { FastifyPluginAsync } from 'fastify';
import { salesOrderTotal } from '@stockflow/shared/src/services/sales-fulfillment';
import type {
     CreateSalesOrderRequest,
     SalesLine,
     SalesOrder,
} from '@stockflow/shared/src/types/inventory.types';
import {
     addSalesLineSchema,
     createSalesOrderSchema,
     getSalesOrderSchema,
     removeSalesLineSchema,
     salesOrderActionSchema,
     updateSalesLineSchema,
} from '../schemas/order.schemas';
import { EngineRouteOptions, actorOf, sendError } from './route-helpers';

const SALES_ORDER_ACTIONS = ['confirm', 'ship', 'deliver', 'cancel'] as const;
type SalesOrderAction = (typeof SALES_ORDER_ACTIONS)[number];

interface LineParams {
     id: string;
     lineId: string;
}

const withTotal = (order: SalesOrder) => ({ ...order, total: salesOrderTotal(order) });

export const salesOrderRoutes: FastifyPluginAsync<EngineRouteOptions> = async (app, { engine }) => {
     const { sales, reservations } = engine;

     app.post<{ Body: CreateSalesOrderRequest }>(
          '/',
          { schema: createSalesOrderSchema },
          async (request, reply) => {
               try {
                    const order = await sales.createOrder(request.body, actorOf(request));
                    return reply.code(201).send(withTotal(order));
               } catch (error) {
                    return sendError(reply, error, 'Failed to create sales order');
               }
          }
     );

     app.get<{ Params: { id: string } }>('/:id', { schema: getSalesOrderSchema }, async (request, reply) => {
          try {
               const order = await sales.get(request.params.id);
               const reservation = await reservations.getForOrder(order.id);
               return reply.send({ ...withTotal(order), reservedLines: reservation?.lines ?? [] });
          } catch (error) {
               return sendError(reply, error, 'Failed to get sales order');
          }
     });

     app.post<{ Params: { id: string }; Body: SalesLine }>(
          '/:id/lines',
          { schema: addSalesLineSchema },
          async (request, reply) => {
               try {
                    const order = await sales.addLine(request.params.id, request.body, actorOf(request));
                    return reply.code(201).send(withTotal(order));
               } catch (error) {
                    return sendError(reply, error, 'Failed to add sales order line');
               }
          }
     );

     app.patch<{ Params: LineParams; Body: { quantity?: number; unitPrice?: number; locationId?: number } }>(
          '/:id/lines/:lineId',
          { schema: updateSalesLineSchema },
          async (request, reply) => {
               const { id, lineId } = request.params;
               try {
                    const order = await sales.updateLine(id, lineId, request.body, actorOf(request));
                    return reply.send(withTotal(order));
               } catch (error) {
                    return sendError(reply, error, 'Failed to update sales order line');
               }
          }
     );

     app.delete<{ Params: LineParams }>(
          '/:id/lines/:lineId',
          { schema: removeSalesLineSchema },
          async (request, reply) => {
               const { id, lineId } = request.params;
               try {
                    return reply.send(withTotal(await sales.removeLine(id, lineId, actorOf(request))));
               } catch (error) {
                    return sendError(reply, error, 'Failed to remove sales order line');
               }
          }
     );

     const actions: Record<SalesOrderAction, (id: string, actor: string) => Promise<SalesOrder>> = {
          confirm: (id, actor) => sales.confirm(id, actor),
          ship: (id, actor) => sales.ship(id, actor),
          deliver: (id, actor) => sales.deliver(id, actor),
          cancel: (id, actor) => sales.cancel(id, actor),
     };

     for (const action of SALES_ORDER_ACTIONS) {
          app.post<{ Params: { id: string } }>(
               `/:id/${action}`,
               { schema: salesOrderActionSchema(`Move a sales order through ${action}`) },
               async (request, reply) => {
                    try {
                         return reply.send(withTotal(await actions[action](request.params.id, actorOf(request))));
                    } catch (error) {
                         return sendError(reply, error, `Failed to ${action} sales order`);
                    }
               }
          );
     }
};
