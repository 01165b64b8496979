import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  CategoryService,
  logger,
  principalFromEvent,
  parseJsonBody,
  parseCategoryInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const categories = new CategoryService();

/**
 * Create Category Lambda Handler
 * POST /categories
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const input = parseCategoryInput(parseJsonBody(event));
    return successResponse(201, await categories.create(principal, input));
  } catch (error) {
    return handleError(error, 'Failed to create category');
  }
};
