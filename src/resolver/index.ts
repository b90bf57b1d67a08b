export { InputResolver, selectSource, type InputResolverOptions } from './input-resolver.js';
