import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  AuthService,
  logger,
  parseJsonBody,
  parseLoginInput,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

// Initialize services (reused across invocations)
const auth = new AuthService();

/**
 * Login Lambda Handler
 * POST /auth/login
 *
 * Public. Exchanges username and password for a bearer token.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);
  logger.info('Login request received');

  try {
    const input = parseLoginInput(parseJsonBody(event));
    const token = await auth.login(input);
    return successResponse(200, token);
  } catch (error) {
    return handleError(error, 'Login failed');
  }
};
