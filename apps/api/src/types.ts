import type { RequestIdVariables } from 'hono/request-id';

/** Custom Hono variables set by middleware */
export type AppVariables = RequestIdVariables;

/** Hono env type for all routes */
export type AppEnv = {
  Variables: AppVariables;
};
