import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  CategoryService,
  logger,
  principalFromEvent,
  pathId,
  parseJsonBody,
  parseCategoryUpdateInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const categories = new CategoryService();

/**
 * Update Category Lambda Handler
 * PUT /categories/{id}
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const id = pathId(event);
    const input = parseCategoryUpdateInput(parseJsonBody(event));
    return successResponse(200, await categories.update(principal, id, input));
  } catch (error) {
    return handleError(error, 'Failed to update category');
  }
};
