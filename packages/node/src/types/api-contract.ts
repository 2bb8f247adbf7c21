/**
 * Hono environment shared by the app, middleware and routes.
 */

export interface AppVariables {
  requestId: string;
}

export interface AppEnv {
  Variables: AppVariables;
}

/** Successful responses wrap their payload as `{ data }`. */
export interface DataEnvelope<T> {
  readonly data: T;
}
