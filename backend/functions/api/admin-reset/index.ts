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
 * Reset Database Lambda Handler
 * POST /admin/reset
 *
 * Admin only. Clears every table and reloads the seed data:
 * 3 users, 5 categories, 20 products and 10 orders.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const result = await admin.reset(principal);
    logger.info('Database reset complete', { ...result });

    return successResponse(200, result);
  } catch (error) {
    return handleError(error, 'Failed to reset database');
  }
};
