import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  CategoryService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  noContentResponse,
  handleError,
} from 'qa-sandbox-shared';

const categories = new CategoryService();

/**
 * Delete Category Lambda Handler
 * DELETE /categories/{id}
 *
 * Products keep their categoryId and read back with `category: null`.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    await categories.delete(principal, pathId(event));
    return noContentResponse();
  } catch (error) {
    return handleError(error, 'Failed to delete category');
  }
};
