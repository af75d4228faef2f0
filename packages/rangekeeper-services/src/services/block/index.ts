export { BlockResolver } from './block-resolver.js';
export type { BlockResolverDependencies, ResolveBlockOptions } from './block-resolver.js';
