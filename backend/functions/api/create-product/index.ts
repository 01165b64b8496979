import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  ProductService,
  logger,
  principalFromEvent,
  parseJsonBody,
  parseProductInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const products = new ProductService();

/**
 * Create Product Lambda Handler
 * POST /products
 *
 * SKU must be unique; categoryId, when given, must name an existing category.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const input = parseProductInput(parseJsonBody(event));
    return successResponse(201, await products.create(principal, input));
  } catch (error) {
    return handleError(error, 'Failed to create product');
  }
};
