import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  AuthService,
  logger,
  principalFromEvent,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const auth = new AuthService();

/**
 * Current User Lambda Handler
 * GET /auth/me
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    return successResponse(200, await auth.me(principal));
  } catch (error) {
    return handleError(error, 'Failed to load current user');
  }
};
