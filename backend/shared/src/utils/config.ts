/**
 * Runtime configuration, read from the Lambda environment
 */

export const TABLE_ENV_VARS = {
  users: 'USERS_TABLE_NAME',
  categories: 'CATEGORIES_TABLE_NAME',
  products: 'PRODUCTS_TABLE_NAME',
  orders: 'ORDERS_TABLE_NAME',
  orderEvents: 'ORDER_EVENTS_TABLE_NAME',
  uniqueKeys: 'UNIQUE_KEYS_TABLE_NAME',
  counters: 'COUNTERS_TABLE_NAME',
} as const;

export type TableKey = keyof typeof TABLE_ENV_VARS;

export interface AppConfig {
  appName: string;
  region: string;
  jwt: {
    secret?: string;                  // Local override
    secretId?: string;                // Secrets Manager secret holding { "secret": "..." }
    algorithm: string;
    expireMinutes: number;
  };
  seedOnEmpty: boolean;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  return {
    appName: process.env.APP_NAME || 'QA Testing API',
    region: process.env.AWS_REGION || 'us-east-2',
    jwt: {
      secret: process.env.JWT_SECRET || undefined,
      secretId: process.env.JWT_SECRET_ID || undefined,
      algorithm: process.env.JWT_ALGORITHM || 'HS256',
      expireMinutes: intFromEnv('ACCESS_TOKEN_EXPIRE_MINUTES', 1440),
    },
    seedOnEmpty: process.env.SEED_ON_EMPTY === 'true',
  };
}

/**
 * Get table name from environment
 */
export function getTableName(table: TableKey): string {
  const envVar = TABLE_ENV_VARS[table];
  const tableName = process.env[envVar];
  if (!tableName) {
    throw new Error(`Environment variable ${envVar} is not set`);
  }
  return tableName;
}
