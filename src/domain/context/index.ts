/**
 * @eventframe/core - Context Module
 *
 * Request-scoped context propagation
 */

export type { IContext, ContextData } from './IContext';
export {
  RequestContext,
  getCurrentContext,
  tryGetCurrentContext,
} from './RequestContext';
