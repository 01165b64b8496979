// Table names and secrets for every test run; nothing here reaches AWS
process.env.USERS_TABLE_NAME = 'test-users';
process.env.CATEGORIES_TABLE_NAME = 'test-categories';
process.env.PRODUCTS_TABLE_NAME = 'test-products';
process.env.ORDERS_TABLE_NAME = 'test-orders';
process.env.ORDER_EVENTS_TABLE_NAME = 'test-order-events';
process.env.UNIQUE_KEYS_TABLE_NAME = 'test-unique-keys';
process.env.COUNTERS_TABLE_NAME = 'test-counters';
process.env.AWS_REGION = 'us-east-2';
process.env.JWT_SECRET = 'test-secret';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'ERROR';
