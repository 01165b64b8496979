import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  ProductService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const products = new ProductService();

/**
 * Get Product Lambda Handler
 * GET /products/{id}
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    return successResponse(200, await products.get(principal, pathId(event)));
  } catch (error) {
    return handleError(error, 'Failed to get product');
  }
};
