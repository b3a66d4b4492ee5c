import { envResolver } from './env';
import { includeResolver } from './include';
import type { Resolver } from './types';
import { varResolver } from './var';

/**
 * Resolvers every engine registers under the reserved prefix
 */
export const builtinResolvers: readonly Resolver[] = [varResolver, includeResolver, envResolver];
