/**
 * Constants for the end-session endpoint
 */

/**
 * OAuth 2.0 / OIDC error codes used by the logout flow
 */
export const ERROR_CODES = {
  INVALID_REQUEST: 'invalid_request',
  SERVER_ERROR: 'server_error',
  TEMPORARILY_UNAVAILABLE: 'temporarily_unavailable',
} as const;

/**
 * HTTP Status Codes
 */
export const HTTP_STATUS = {
  OK: 200,
  FOUND: 302,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * OAuth / OIDC request and response parameter names
 */
export const PARAMETERS = {
  ERROR: 'error',
  ERROR_DESCRIPTION: 'error_description',
  ERROR_URI: 'error_uri',
  POST_LOGOUT_REDIRECT_URI: 'post_logout_redirect_uri',
  STATE: 'state',
} as const;

/**
 * Application permissions
 */
export const PERMISSIONS = {
  ENDPOINT_LOGOUT: 'endpoint:logout',
} as const;

/**
 * Default logout endpoint path
 */
export const DEFAULT_LOGOUT_ENDPOINT_PATH = '/logout';

export const FORM_URLENCODED = 'application/x-www-form-urlencoded';
