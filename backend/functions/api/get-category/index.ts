import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  CategoryService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const categories = new CategoryService();

/**
 * Get Category Lambda Handler
 * GET /categories/{id}
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    return successResponse(200, await categories.get(principal, pathId(event)));
  } catch (error) {
    return handleError(error, 'Failed to get category');
  }
};
