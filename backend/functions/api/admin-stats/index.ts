import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  AdminService,
  logger,
  principalFromEvent,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const admin = new AdminService();

/**
 * Database Statistics Lambda Handler
 * GET /admin/stats
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    return successResponse(200, await admin.stats(principal));
  } catch (error) {
    return handleError(error, 'Failed to load stats');
  }
};
