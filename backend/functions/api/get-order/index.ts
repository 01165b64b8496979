import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  OrderService,
  logger,
  principalFromEvent,
  pathId,
  parseBooleanParam,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const orders = new OrderService();

/**
 * Get Order Lambda Handler
 * GET /orders/{id}?includeEvents=true
 *
 * An order the caller may not see is reported as not found.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    const orderId = pathId(event);
    logger.setContext({ userId: principal.id, role: principal.role, orderId });

    const includeEvents = parseBooleanParam(event.queryStringParameters, 'includeEvents') ?? false;
    const order = await orders.get(principal, orderId, { includeEvents });

    return successResponse(200, order);
  } catch (error) {
    return handleError(error, 'Failed to get order');
  }
};
