export { builtinResolvers } from './builtins';
export { envResolver } from './env';
export { includeResolver, VALUE_KEY } from './include';
export { CONTENT_ATTRIBUTE, RESERVED_PREFIX } from './types';
export type { Resolver, ResolverRuntime, TagInfo } from './types';
export { varResolver } from './var';
