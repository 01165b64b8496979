import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  OrderService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  noContentResponse,
  handleError,
} from 'qa-sandbox-shared';

const orders = new OrderService();

/**
 * Delete Order Lambda Handler
 * DELETE /orders/{id}
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    const orderId = pathId(event);
    logger.setContext({ userId: principal.id, role: principal.role, orderId });

    await orders.delete(principal, orderId);
    return noContentResponse();
  } catch (error) {
    return handleError(error, 'Failed to delete order');
  }
};
