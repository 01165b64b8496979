import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  UserService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const users = new UserService();

/**
 * Get User Lambda Handler
 * GET /users/{id}
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    return successResponse(200, await users.get(principal, pathId(event)));
  } catch (error) {
    return handleError(error, 'Failed to get user');
  }
};
