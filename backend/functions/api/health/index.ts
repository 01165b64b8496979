import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import {
  SeedService,
  loadConfig,
  logger,
  setRequestContext,
  successResponse,
  handleError,
} from 'qa-sandbox-shared';

const config = loadConfig();

// Only touches the database when SEED_ON_EMPTY is enabled
let seeder: SeedService | undefined;

/**
 * Health Check Lambda Handler
 * GET /health
 *
 * Public. With SEED_ON_EMPTY=true an empty database is seeded on the first check.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  setRequestContext(event);

  try {
    if (config.seedOnEmpty) {
      seeder = seeder ?? new SeedService();
      const seeded = await seeder.seedIfEmpty();
      if (seeded) {
        logger.info('Empty database seeded on health check', { ...seeded });
      }
    }

    return successResponse(200, { status: 'healthy', name: config.appName });
  } catch (error) {
    return handleError(error, 'Health check failed');
  }
};
