/**
 * @endsession/logout
 *
 * OpenID Connect RP-initiated logout endpoint built on the staged pipeline.
 */

export * from './applications';
export * from './logout';
export * from './endpoint';
export * from './app';
