import { APIGatewayTokenAuthorizerEvent, APIGatewayAuthorizerResult } from 'aws-lambda';
import { AuthService, logger } from 'qa-sandbox-shared';

const auth = new AuthService();

/**
 * Lambda Token Authorizer
 *
 * Verifies the bearer JWT, loads the user and rejects inactive accounts.
 * The principal reaches handlers through the authorizer context.
 */
export const handler = async (event: APIGatewayTokenAuthorizerEvent): Promise<APIGatewayAuthorizerResult> => {
  try {
    // Extract token from "Bearer <token>" format
    const token = event.authorizationToken?.replace(/^Bearer\s+/i, '');

    if (!token) {
      logger.warn('No token provided');
      throw new Error('Unauthorized');
    }

    const principal = await auth.authenticate(token);
    logger.info('Token valid', { userId: principal.id, role: principal.role });

    // Role checks happen per operation, so the policy covers the whole API
    // methodArn format: arn:aws:execute-api:region:account:apiId/stage/method/resource
    const arnParts = event.methodArn.split('/');
    const apiGatewayArnBase = arnParts.slice(0, 2).join('/');

    return generatePolicy(String(principal.id), 'Allow', `${apiGatewayArnBase}/*/*`, {
      userId: String(principal.id),
      role: principal.role,
    });
  } catch (error) {
    logger.warn('Authorization failed', {
      reason: error instanceof Error ? error.message : String(error),
    });
    // API Gateway answers 401 for this exact message
    throw new Error('Unauthorized');
  }
};

/**
 * Generate IAM policy for API Gateway
 */
export function generatePolicy(
  principalId: string,
  effect: 'Allow' | 'Deny',
  resource: string,
  context?: Record<string, string>
): APIGatewayAuthorizerResult {
  const authResponse: APIGatewayAuthorizerResult = {
    principalId,
    policyDocument: {
      Version: '2012-10-17',
      Statement: [
        {
          Action: 'execute-api:Invoke',
          Effect: effect,
          Resource: resource,
        },
      ],
    },
  };

  // Add context that will be passed to the Lambda function
  if (context) {
    authResponse.context = context;
  }

  return authResponse;
}
