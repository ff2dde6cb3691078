/**
 * Injection tokens and engine-wide defaults
 */
export const PAGINATION_CONFIG = 'QUERY_ENGINE_PAGINATION_CONFIG';

export const DEFAULT_PER_PAGE = 15;
export const MIN_PER_PAGE = 1;
export const MAX_PER_PAGE = 100;

export const CURSOR_TTL_SECONDS = 60 * 60;
export const CURSOR_ISSUER = 'query-engine-pagination';

export const PAGINATION_SECRET_ENV = 'PAGINATION_SECRET';
// Used only when PAGINATION_SECRET is unset. Anyone who knows it can forge cursors.
export const INSECURE_DEFAULT_PAGINATION_SECRET = 'query-engine-insecure-default-pagination-secret';
