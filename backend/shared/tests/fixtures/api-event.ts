import { APIGatewayProxyEvent } from 'aws-lambda';
import { Principal } from '../../src/types';

/**
 * API Gateway proxy event with an optional authorizer context
 */
export function buildEvent(
  overrides: Partial<APIGatewayProxyEvent> = {},
  authorizer: Record<string, unknown> | null = null
): APIGatewayProxyEvent {
  return {
    body: null,
    headers: {},
    multiValueHeaders: {},
    httpMethod: 'GET',
    isBase64Encoded: false,
    path: '/orders/1',
    pathParameters: null,
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    stageVariables: null,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      authorizer,
      protocol: 'HTTP/1.1',
      httpMethod: 'GET',
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: '127.0.0.1',
        user: null,
        userAgent: 'jest',
        userArn: null,
      },
      path: '/orders/1',
      stage: 'test',
      requestId: 'test-request-id',
      requestTime: '15/Jan/2024:10:00:00 +0000',
      requestTimeEpoch: 1705312800000,
      resourceId: 'test-resource',
      resourcePath: '/orders/{id}',
    },
    resource: '/orders/{id}',
    ...overrides,
  };
}

/**
 * Event as it arrives after the token authorizer accepted the caller
 */
export function authorizedEvent(principal: Principal, overrides: Partial<APIGatewayProxyEvent> = {}): APIGatewayProxyEvent {
  return buildEvent(overrides, { userId: String(principal.id), role: principal.role });
}
