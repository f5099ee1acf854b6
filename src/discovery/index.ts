/**
 * Discovery module exports
 */

export { buildTypeResolver, createTypeResolver, type TypeResolver } from './resolver.js';
