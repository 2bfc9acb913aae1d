// Interface only - backends live behind their own entry points
export type { Loader } from './loader';
export { scopeOf, errorCode } from './loader';
