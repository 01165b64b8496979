import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  UserService,
  logger,
  principalFromEvent,
  pathId,
  setRequestContext,
  noContentResponse,
  handleError,
} from 'qa-sandbox-shared';

const users = new UserService();

/**
 * Delete User Lambda Handler
 * DELETE /users/{id}
 *
 * Admin only; an admin cannot delete their own account. Orders are kept.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    await users.delete(principal, pathId(event));
    return noContentResponse();
  } catch (error) {
    return handleError(error, 'Failed to delete user');
  }
};
