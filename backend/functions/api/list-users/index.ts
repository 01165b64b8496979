import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  UserService,
  UserRole,
  logger,
  principalFromEvent,
  parseEnumParam,
  parseBooleanParam,
  parsePageParams,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const users = new UserService();

/**
 * List Users Lambda Handler
 * GET /users?role=&isActive=&skip=&limit=
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const params = event.queryStringParameters;
    const result = await users.list(
      principal,
      {
        role: parseEnumParam(params, 'role', UserRole),
        isActive: parseBooleanParam(params, 'isActive'),
      },
      parsePageParams(params)
    );

    return successResponse(200, result);
  } catch (error) {
    return handleError(error, 'Failed to list users');
  }
};
