import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  ProductService,
  logger,
  principalFromEvent,
  pathId,
  parseJsonBody,
  parseProductUpdateInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const products = new ProductService();

/**
 * Update Product Lambda Handler
 * PUT /products/{id}
 *
 * `categoryId: null` detaches the product from its category.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const id = pathId(event);
    const input = parseProductUpdateInput(parseJsonBody(event));
    return successResponse(200, await products.update(principal, id, input));
  } catch (error) {
    return handleError(error, 'Failed to update product');
  }
};
