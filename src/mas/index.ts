/**
 * Ordering workflow exports
 */

export * from './config';
export * from './errors';
export * from './resilience';
export * from './memory';
export * from './tracing';
export * from './orchestrator';
export * from './llm/client';
export * from './tools/types';
export * from './tools/vendor-client';
export * from './translation/languages';
export * from './translation/queue';
export * from './translation/memory';
export * from './translation/translator';
export * from './agents/fields';
export * from './agents/validators';
export * from './agents/base';
export * from './agents/product-request';
export * from './agents/request-details';
export * from './agents/address-purpose';
export * from './orders/placement';
export * from './runtime';
