import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  ProductService,
  logger,
  principalFromEvent,
  parseBooleanParam,
  parseIntParam,
  parseNumberParam,
  parsePageParams,
  parseSortField,
  parseSortOrder,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const products = new ProductService();

/**
 * List Products Lambda Handler
 * GET /products
 *
 * Query parameters:
 * - isActive, inStock: true | false
 * - categoryId: Filter by category
 * - minPrice, maxPrice: Price range in cents
 * - search: Case-insensitive match on name or SKU
 * - sortBy: price | name | createdAt | stock, sortOrder: asc | desc
 * - skip, limit: Paging (limit 1-100, default 20)
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const params = event.queryStringParameters;
    const filter = {
      isActive: parseBooleanParam(params, 'isActive'),
      categoryId: parseIntParam(params, 'categoryId', { min: 1 }),
      minPrice: parseNumberParam(params, 'minPrice'),
      maxPrice: parseNumberParam(params, 'maxPrice'),
      inStock: parseBooleanParam(params, 'inStock'),
      search: params?.search || undefined,
      sortBy: parseSortField(params),
      sortOrder: parseSortOrder(params),
    };

    logger.info('List products request received', { ...filter });

    const result = await products.list(principal, filter, parsePageParams(params));
    return successResponse(200, result);
  } catch (error) {
    return handleError(error, 'Failed to list products');
  }
};
