import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  CategoryService,
  logger,
  principalFromEvent,
  parseBooleanParam,
  parsePageParams,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const categories = new CategoryService();

/**
 * List Categories Lambda Handler
 * GET /categories?isActive=&search=&skip=&limit=
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    const principal = principalFromEvent(event);
    logger.setContext({ userId: principal.id, role: principal.role });

    const params = event.queryStringParameters;
    const result = await categories.list(
      principal,
      {
        isActive: parseBooleanParam(params, 'isActive'),
        search: params?.search || undefined,
      },
      parsePageParams(params)
    );

    return successResponse(200, result);
  } catch (error) {
    return handleError(error, 'Failed to list categories');
  }
};
