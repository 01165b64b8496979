import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  OrderService,
  OrderStatus,
  logger,
  principalFromEvent,
  parseEnumParam,
  parseIntParam,
  parsePageParams,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const orders = new OrderService();

/**
 * List Orders Lambda Handler
 * GET /orders?status=&userId=&skip=&limit=
 *
 * Newest first. Viewers only see their own orders; userId is ignored for them.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const params = event.queryStringParameters;
    const result = await orders.list(
      principal,
      {
        status: parseEnumParam(params, 'status', OrderStatus),
        userId: parseIntParam(params, 'userId', { min: 1 }),
      },
      parsePageParams(params)
    );

    return successResponse(200, result);
  } catch (error) {
    return handleError(error, 'Failed to list orders');
  }
};
