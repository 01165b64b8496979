import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  OrderService,
  logger,
  principalFromEvent,
  parseJsonBody,
  parseOrderCreateInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

// Initialize services (reused across invocations)
const orders = new OrderService();

/**
 * Create Order Lambda Handler
 * POST /orders
 *
 * Flow:
 * 1. Validates the body; repeated productIds are merged
 * 2. Checks every product exists, is active and has enough stock
 * 3. Freezes current prices into the item snapshot and computes the total
 * 4. Writes the order, the stock decrements and the ORDER_CREATED event in
 *    one transaction; a price change in between triggers a retry
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  logger.info('Create order request received', {
    path: event.path,
    method: event.httpMethod,
  });

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const input = parseOrderCreateInput(parseJsonBody(event));
    logger.info('Creating order', { itemCount: input.items.length });

    const order = await orders.create(principal, input);
    logger.setContext({ orderId: order.id });

    return successResponse(201, order);
  } catch (error) {
    return handleError(error, 'Failed to create order');
  }
};
