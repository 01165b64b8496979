import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  ProductService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  noContentResponse,
  handleError,
} from 'qa-sandbox-shared';

const products = new ProductService();

/**
 * Delete Product Lambda Handler
 * DELETE /products/{id}
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    await products.delete(principal, pathId(event));
    return noContentResponse();
  } catch (error) {
    return handleError(error, 'Failed to delete product');
  }
};
