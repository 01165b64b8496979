import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  AuthService,
  logger,
  parseJsonBody,
  parseRegisterInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const auth = new AuthService();

/**
 * Register Lambda Handler
 * POST /auth/register
 *
 * Public. Self-registration is limited to the tester (default) and viewer roles.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);
  logger.info('Register request received');

  try {
    const input = parseRegisterInput(parseJsonBody(event));
    const user = await auth.register(input);
    return successResponse(201, user);
  } catch (error) {
    return handleError(error, 'Registration failed');
  }
};
