import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  OrderService,
  logger,
  principalFromEvent,
  pathId,
  parseJsonBody,
  parseOrderUpdateInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const orders = new OrderService();

/**
 * Update Order Lambda Handler
 * PUT /orders/{id}
 *
 * Body: { status?, shippingAddress?, notes? }. Status moves one step along
 * pending -> confirmed -> shipped; `cancelled` restores stock.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    const orderId = pathId(event);
    logger.setContext({ userId: principal.id, role: principal.role, orderId });

    const input = parseOrderUpdateInput(parseJsonBody(event));
    return successResponse(200, await orders.update(principal, orderId, input));
  } catch (error) {
    return handleError(error, 'Failed to update order');
  }
};
