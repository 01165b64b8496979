import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  OrderService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const orders = new OrderService();

/**
 * Cancel Order Lambda Handler
 * POST /orders/{id}/cancel
 *
 * Pending orders only. Viewers may cancel their own orders.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    const orderId = pathId(event);
    logger.setContext({ userId: principal.id, role: principal.role, orderId });

    logger.info('Cancel order request received');
    return successResponse(200, await orders.cancel(principal, orderId));
  } catch (error) {
    return handleError(error, 'Failed to cancel order');
  }
};
