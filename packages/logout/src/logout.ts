/**
 * Logout Endpoint Defaults
 *
 * Built-in stage logic of the OpenID Connect RP-initiated logout endpoint:
 * - Extract: accept GET (query string) or POST (form body)
 * - Validate: check post_logout_redirect_uri and match it to an application
 * - Handle: nothing; extensions end sessions here
 * - Apply-Response: redirect to the validated URI and flow `state` back
 *
 * @see https://openid.net/specs/openid-connect-rpinitiated-1_0.html
 */

import {
  ConfigurationError,
  ERROR_CODES,
  FORM_URLENCODED,
  PARAMETERS,
  PERMISSIONS,
} from '@endsession/lib-core';
import {
  OAuthMessage,
  type ApplyResponseContext,
  type EndpointDefaults,
  type ExtractRequestContext,
  type ValidateRequestContext,
} from '@endsession/lib-pipeline';
import type { Application, ApplicationResolver } from './applications';

export const LOGOUT_ERROR_DESCRIPTIONS = {
  INVALID_METHOD: 'The specified HTTP method is not valid.',
  INVALID_CONTENT_TYPE: "The specified 'Content-Type' header is not valid.",
  REDIRECT_URI_NOT_ABSOLUTE:
    "The 'post_logout_redirect_uri' parameter must be a valid absolute URL.",
  REDIRECT_URI_HAS_FRAGMENT: "The 'post_logout_redirect_uri' parameter must not include a fragment.",
  REDIRECT_URI_NOT_VALID: "The specified 'post_logout_redirect_uri' parameter is not valid.",
} as const;

export interface LogoutValidationSettings {
  /** Accept any registered application, with or without the logout permission */
  ignoreEndpointPermissions: boolean;
  /** Skip application lookups; a well-formed redirect URI is accepted as is */
  degradedMode: boolean;
  applications?: ApplicationResolver;
}

/**
 * post_logout_redirect_uri shape check result
 */
export interface RedirectUriValidationResult {
  valid: boolean;
  error?: string;
}

// Drive-letter paths parse as URLs with a one-letter scheme
const WINDOWS_PATH = /^[a-zA-Z]:[\\/]/;
const INVALID_URL_CHARACTERS = /[\s\\]/;

/**
 * Whether a value is an absolute URL written in canonical form
 */
export function isWellFormedAbsoluteUrl(value: string): boolean {
  if (INVALID_URL_CHARACTERS.test(value) || WINDOWS_PATH.test(value)) {
    return false;
  }
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate the shape of a post_logout_redirect_uri
 *
 * Per OIDC RP-Initiated Logout 1.0 the value must be an absolute URL and,
 * like redirect_uri, must not carry a fragment.
 */
export function validatePostLogoutRedirectUri(uri: string): RedirectUriValidationResult {
  if (!isWellFormedAbsoluteUrl(uri)) {
    return { valid: false, error: LOGOUT_ERROR_DESCRIPTIONS.REDIRECT_URI_NOT_ABSOLUTE };
  }
  if (uri.includes('#')) {
    return { valid: false, error: LOGOUT_ERROR_DESCRIPTIONS.REDIRECT_URI_HAS_FRAGMENT };
  }
  return { valid: true };
}

/**
 * First application registered with the URI that may use the logout endpoint.
 * Candidates are checked in resolver order and the search stops at the first
 * match.
 */
export async function findLogoutApplication(
  resolver: ApplicationResolver,
  uri: string,
  enforcePermissions: boolean,
  signal?: AbortSignal
): Promise<Application | undefined> {
  for await (const application of resolver.findByPostLogoutRedirectUri(uri, signal)) {
    if (!enforcePermissions) {
      return application;
    }
    if (await resolver.hasPermission(application, PERMISSIONS.ENDPOINT_LOGOUT, signal)) {
      return application;
    }
  }
  return undefined;
}

function mediaType(contentType: string | null): string | undefined {
  return contentType?.split(';')[0]?.trim().toLowerCase();
}

/**
 * Extract: bind the query string (GET) or the form body (POST)
 */
export async function extractLogoutRequest(context: ExtractRequestContext): Promise<void> {
  const raw = context.rawRequest;

  switch (raw.method.toUpperCase()) {
    case 'GET':
      context.request = OAuthMessage.fromSearchParams(new URL(raw.url).searchParams);
      return;

    case 'POST': {
      if (mediaType(raw.headers.get('Content-Type')) !== FORM_URLENCODED) {
        context.reject(ERROR_CODES.INVALID_REQUEST, LOGOUT_ERROR_DESCRIPTIONS.INVALID_CONTENT_TYPE);
        return;
      }
      context.request = OAuthMessage.fromSearchParams(new URLSearchParams(await raw.text()));
      return;
    }

    default:
      context.logger.info('Logout request uses an unsupported HTTP method', {
        method: raw.method,
      });
      context.reject(ERROR_CODES.INVALID_REQUEST, LOGOUT_ERROR_DESCRIPTIONS.INVALID_METHOD);
  }
}

/**
 * Validate: check the redirect URI and resolve the application owning it
 */
export async function validateLogoutRequest(
  context: ValidateRequestContext,
  settings: LogoutValidationSettings
): Promise<void> {
  const address = context.request.postLogoutRedirectUri;
  if (!address) {
    return;
  }

  const shape = validatePostLogoutRedirectUri(address);
  if (!shape.valid) {
    context.reject(ERROR_CODES.INVALID_REQUEST, shape.error);
    return;
  }

  if (settings.degradedMode) {
    context.redirectUri = address;
    return;
  }

  if (!settings.applications) {
    throw new ConfigurationError('An application resolver is required unless degraded mode is enabled');
  }

  const application = await findLogoutApplication(
    settings.applications,
    address,
    !settings.ignoreEndpointPermissions,
    context.transaction.signal
  );

  if (!application) {
    context.logger.info('No application may use the post_logout_redirect_uri', {
      postLogoutRedirectUri: address,
    });
    context.reject(ERROR_CODES.INVALID_REQUEST, LOGOUT_ERROR_DESCRIPTIONS.REDIRECT_URI_NOT_VALID);
    return;
  }

  context.redirectUri = address;
  context.applicationId = application.id;
}

/**
 * Apply-Response: redirect to the validated URI, echoing `state` unless an
 * extension already set one
 */
export function applyLogoutResponse(context: ApplyResponseContext): void {
  const address = context.validatedRedirectUri;
  if (!address) {
    return;
  }

  context.redirectUri = address;
  if (!context.response.has(PARAMETERS.STATE)) {
    context.response.state = context.request?.state;
  }
}

export function createLogoutDefaults(settings: LogoutValidationSettings): EndpointDefaults {
  return {
    extract: extractLogoutRequest,
    validate: (context) => validateLogoutRequest(context, settings),
    applyResponse: applyLogoutResponse,
  };
}
