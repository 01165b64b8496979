import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  UserService,
  logger,
  principalFromEvent,
  pathId,
  parseJsonBody,
  parseUserUpdateInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const users = new UserService();

/**
 * Update User Lambda Handler
 * PUT /users/{id}
 *
 * Admin only. Email and username stay unique.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const id = pathId(event);
    const input = parseUserUpdateInput(parseJsonBody(event));
    return successResponse(200, await users.update(principal, id, input));
  } catch (error) {
    return handleError(error, 'Failed to update user');
  }
};
