export * from './policy-engine';
export * from './visibility-filter';
export * from './order-lifecycle';
