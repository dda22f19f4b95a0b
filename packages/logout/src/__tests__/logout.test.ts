/**
 * Logout Endpoint Tests
 *
 * End-to-end through the Hono application: method checks, redirect URI
 * validation, state propagation and the effect of handlers on every stage.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InvalidOperationError, PipelineCancelledError } from '@endsession/lib-core';
import type { AnyHandlerDescriptor, BaseStageContext } from '@endsession/lib-pipeline';
import { createLogoutApp } from '../app';
import { InMemoryApplicationStore, type Application, type ApplicationResolver } from '../applications';
import { LogoutEndpoint, type LogoutEndpointOptions } from '../endpoint';

const REDIRECT_URI = 'https://rp.example.com/logout/callback';
const UNPERMITTED_URI = 'https://other.example.com/callback';

const SERVER_ERROR_BODY = {
  error: 'server_error',
  error_description: 'An internal error occurred while processing the request.',
};

function createStore(): InMemoryApplicationStore {
  return new InMemoryApplicationStore([
    {
      id: 'app-1',
      postLogoutRedirectUris: [REDIRECT_URI],
      permissions: ['endpoint:logout'],
    },
    {
      id: 'app-2',
      postLogoutRedirectUris: [UNPERMITTED_URI],
      permissions: [],
    },
  ]);
}

function query(params: Record<string, string>): string {
  return `/logout?${new URLSearchParams(params).toString()}`;
}

function postForm(params: Record<string, string>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(params).toString(),
  };
}

describe('Logout endpoint', () => {
  let store: InMemoryApplicationStore;

  beforeEach(() => {
    store = createStore();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createApp(options: LogoutEndpointOptions = {}) {
    return createLogoutApp({ applications: store, ...options });
  }

  describe('HTTP method', () => {
    it.each(['DELETE', 'PUT', 'PATCH', 'OPTIONS'])('should reject %s', async (method) => {
      const res = await createApp().request('/logout', { method });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'The specified HTTP method is not valid.',
      });
    });

    it('should reject HEAD with a 400 and no body, as HEAD responses carry none', async () => {
      const res = await createApp().request('/logout', { method: 'HEAD' });

      expect(res.status).toBe(400);
      expect(await res.text()).toBe('');
    });

    it('should accept GET without parameters', async () => {
      const res = await createApp().request('/logout');

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toBe('application/json');
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(await res.json()).toEqual({});
    });

    it('should accept a form POST without parameters', async () => {
      const res = await createApp().request('/logout', postForm({}));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
    });

    it('should reject a POST that is not form encoded', async () => {
      const res = await createApp().request('/logout', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ state: 'abc' }),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: "The specified 'Content-Type' header is not valid.",
      });
    });
  });

  describe('post_logout_redirect_uri', () => {
    it.each(['/path', 'relative/path', 'C:\\Windows\\logout', 'https://rp.example.com/ spaced'])(
      'should reject %s as not absolute',
      async (uri) => {
        const res = await createApp().request(query({ post_logout_redirect_uri: uri }));

        expect(res.status).toBe(400);
        expect(await res.json()).toEqual({
          error: 'invalid_request',
          error_description: "The 'post_logout_redirect_uri' parameter must be a valid absolute URL.",
        });
      }
    );

    it('should reject a fragment', async () => {
      const res = await createApp().request(
        query({ post_logout_redirect_uri: `${REDIRECT_URI}#section` })
      );

      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: "The 'post_logout_redirect_uri' parameter must not include a fragment.",
      });
    });

    it('should reject an unregistered URI', async () => {
      const res = await createApp().request(
        query({ post_logout_redirect_uri: 'https://unknown.example.com/callback' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: "The specified 'post_logout_redirect_uri' parameter is not valid.",
      });
    });

    it('should reject a URI whose application lacks the logout permission', async () => {
      const res = await createApp().request(query({ post_logout_redirect_uri: UNPERMITTED_URI }));

      expect(res.status).toBe(400);
    });

    it('should accept that URI when permissions are ignored', async () => {
      const res = await createApp({ ignoreEndpointPermissions: true }).request(
        query({ post_logout_redirect_uri: UNPERMITTED_URI })
      );

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(UNPERMITTED_URI);
    });

    it('should redirect to a registered URI', async () => {
      const res = await createApp().request(query({ post_logout_redirect_uri: REDIRECT_URI }));

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(REDIRECT_URI);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
    });

    it('should accept the URI from a form POST', async () => {
      const res = await createApp().request(
        '/logout',
        postForm({ post_logout_redirect_uri: REDIRECT_URI, state: 'af0ifjsldkj' })
      );

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(`${REDIRECT_URI}?state=af0ifjsldkj`);
    });

    it('should keep the query the URI was registered with', async () => {
      store.add({
        id: 'app-3',
        postLogoutRedirectUris: ['https://rp.example.com/cb?tenant=1'],
        permissions: ['endpoint:logout'],
      });

      const res = await createApp().request(
        query({ post_logout_redirect_uri: 'https://rp.example.com/cb?tenant=1', state: 'xyz' })
      );

      expect(res.headers.get('Location')).toBe('https://rp.example.com/cb?tenant=1&state=xyz');
    });

    it('should accept any well-formed URI in degraded mode', async () => {
      const app = createLogoutApp({ degradedMode: true });

      const accepted = await app.request(
        query({ post_logout_redirect_uri: 'https://unknown.example.com/callback' })
      );
      const rejected = await app.request(query({ post_logout_redirect_uri: 'relative/path' }));

      expect(accepted.status).toBe(302);
      expect(accepted.headers.get('Location')).toBe('https://unknown.example.com/callback');
      expect(rejected.status).toBe(400);
    });
  });

  describe('application lookup', () => {
    function createResolver(permitted: string) {
      const hasPermission = vi.fn(
        async (application: Application, _permission: string): Promise<boolean> =>
          application.id === permitted
      );
      const resolver: ApplicationResolver = {
        async *findByPostLogoutRedirectUri() {
          yield { id: 'first' };
          yield { id: 'second' };
          yield { id: 'third' };
        },
        hasPermission,
      };
      return { resolver, hasPermission };
    }

    it('should stop at the first permitted application', async () => {
      const { resolver, hasPermission } = createResolver('second');
      const seen: { applicationId?: string } = {};

      const res = await createLogoutApp({
        applications: resolver,
        handlers: [
          {
            name: 'capture',
            stage: 'handle',
            handle: (c) => {
              seen.applicationId = c.applicationId;
            },
          },
        ],
      }).request(query({ post_logout_redirect_uri: REDIRECT_URI }));

      expect(res.status).toBe(302);
      expect(hasPermission.mock.calls.map(([application]) => application.id)).toEqual([
        'first',
        'second',
      ]);
      expect(hasPermission.mock.calls[0][1]).toBe('endpoint:logout');
      expect(seen.applicationId).toBe('second');
    });

    it('should check every candidate once when none is permitted', async () => {
      const { resolver, hasPermission } = createResolver('none');
      const find = vi.spyOn(resolver, 'findByPostLogoutRedirectUri');

      const res = await createLogoutApp({ applications: resolver }).request(
        query({ post_logout_redirect_uri: REDIRECT_URI })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: "The specified 'post_logout_redirect_uri' parameter is not valid.",
      });
      expect(find).toHaveBeenCalledTimes(1);
      expect(hasPermission.mock.calls.map(([application]) => application.id)).toEqual([
        'first',
        'second',
        'third',
      ]);
    });

    it('should not check permissions when they are ignored', async () => {
      const { resolver, hasPermission } = createResolver('none');

      const res = await createLogoutApp({
        applications: resolver,
        ignoreEndpointPermissions: true,
      }).request(query({ post_logout_redirect_uri: REDIRECT_URI }));

      expect(res.status).toBe(302);
      expect(hasPermission).not.toHaveBeenCalled();
    });

    it('should not look up applications in degraded mode', async () => {
      const { resolver, hasPermission } = createResolver('first');
      const find = vi.spyOn(resolver, 'findByPostLogoutRedirectUri');

      await createLogoutApp({ applications: resolver, degradedMode: true }).request(
        query({ post_logout_redirect_uri: REDIRECT_URI })
      );

      expect(find).not.toHaveBeenCalled();
      expect(hasPermission).not.toHaveBeenCalled();
    });
  });

  describe('state', () => {
    it('should not echo state without a redirect', async () => {
      const res = await createApp().request(query({ state: 'af0ifjsldkj' }));

      expect(await res.json()).toEqual({});
    });

    it('should keep a state set by a handler', async () => {
      const res = await createApp({
        handlers: [
          {
            name: 'override-state',
            stage: 'applyResponse',
            handle: (c) => {
              c.response.state = 'custom_state';
            },
          },
        ],
      }).request(query({ post_logout_redirect_uri: REDIRECT_URI, state: 'af0ifjsldkj' }));

      expect(res.headers.get('Location')).toBe(`${REDIRECT_URI}?state=custom_state`);
    });
  });

  describe('custom parameters', () => {
    const handlers: AnyHandlerDescriptor[] = [
      {
        name: 'custom-parameters',
        stage: 'handle',
        handle: (c) => {
          c.response.set('custom_parameter', 'custom_value');
          c.response.set('parameter_with_multiple_values', ['custom_value_1', 'custom_value_2']);
        },
      },
    ];

    it('should add custom parameters to the redirect', async () => {
      const res = await createApp({ handlers }).request(
        query({ post_logout_redirect_uri: REDIRECT_URI, state: 'abc' })
      );

      expect(res.headers.get('Location')).toBe(
        `${REDIRECT_URI}?custom_parameter=custom_value` +
          '&parameter_with_multiple_values=custom_value_1' +
          '&parameter_with_multiple_values=custom_value_2&state=abc'
      );
    });

    it('should render custom parameters inline without a redirect URI', async () => {
      const res = await createApp({ handlers }).request('/logout');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        custom_parameter: 'custom_value',
        parameter_with_multiple_values: ['custom_value_1', 'custom_value_2'],
      });
    });
  });

  describe('reject', () => {
    const reject = (c: BaseStageContext): void =>
      c.reject('custom_error', 'custom_description', 'custom_uri');
    const rejectors: AnyHandlerDescriptor[] = [
      { name: 'reject', stage: 'extract', handle: reject },
      { name: 'reject', stage: 'validate', handle: reject },
      { name: 'reject', stage: 'handle', handle: reject },
      { name: 'reject', stage: 'applyResponse', handle: reject },
    ];

    it.each(rejectors)('should return the error set during $stage', async (descriptor) => {
      const res = await createApp({ handlers: [descriptor] }).request(
        query({ post_logout_redirect_uri: REDIRECT_URI, state: 'abc' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'custom_error',
        error_description: 'custom_description',
        error_uri: 'custom_uri',
      });
    });

    const triples: Array<{
      error?: string;
      description?: string;
      uri?: string;
      expected: Record<string, string>;
    }> = [
      { error: 'custom_error', expected: { error: 'custom_error' } },
      {
        error: 'custom_error',
        description: 'custom_description',
        expected: { error: 'custom_error', error_description: 'custom_description' },
      },
      {
        error: 'custom_error',
        description: 'custom_description',
        uri: 'custom_uri',
        expected: {
          error: 'custom_error',
          error_description: 'custom_description',
          error_uri: 'custom_uri',
        },
      },
      {
        description: 'custom_description',
        expected: { error: 'invalid_request', error_description: 'custom_description' },
      },
      {
        description: 'custom_description',
        uri: 'custom_uri',
        expected: {
          error: 'invalid_request',
          error_description: 'custom_description',
          error_uri: 'custom_uri',
        },
      },
      { uri: 'custom_uri', expected: { error: 'invalid_request', error_uri: 'custom_uri' } },
      { expected: { error: 'invalid_request' } },
      {
        error: '',
        description: '',
        uri: '',
        expected: { error: 'invalid_request', error_description: '', error_uri: '' },
      },
    ];

    it.each(triples)(
      'should return reject($error, $description, $uri) from every stage',
      async ({ error, description, uri, expected }) => {
        const rejectWith = (c: BaseStageContext): void => c.reject(error, description, uri);
        const descriptors: AnyHandlerDescriptor[] = [
          { name: 'reject', stage: 'extract', handle: rejectWith },
          { name: 'reject', stage: 'validate', handle: rejectWith },
          { name: 'reject', stage: 'handle', handle: rejectWith },
          { name: 'reject', stage: 'applyResponse', handle: rejectWith },
        ];

        for (const descriptor of descriptors) {
          const res = await createApp({ handlers: [descriptor] }).request(
            query({ post_logout_redirect_uri: REDIRECT_URI, state: 'abc' })
          );

          expect(res.status).toBe(400);
          expect(await res.json()).toEqual(expected);
        }
      }
    );
  });

  describe('handleRequest', () => {
    const handlers: AnyHandlerDescriptor[] = [
      { name: 'handled', stage: 'extract', handle: (c) => c.handleRequest() },
      {
        name: 'handled',
        stage: 'validate',
        handle: (c) => {
          c.transaction.response.set('name', 'Bob le Magnifique');
          c.handleRequest();
        },
      },
      {
        name: 'handled',
        stage: 'handle',
        handle: (c) => {
          c.response.set('name', 'Bob le Magnifique');
          c.handleRequest();
        },
      },
      {
        name: 'handled',
        stage: 'applyResponse',
        handle: (c) => {
          c.response.set('name', 'Bob le Magnifique');
          c.handleRequest();
        },
      },
    ];

    it.each(handlers.slice(1))('should emit the response built during $stage', async (descriptor) => {
      const res = await createApp({ handlers: [descriptor] }).request(query({ state: 'abc' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ name: 'Bob le Magnifique' });
    });

    it('should bypass the method check when extract handles the request', async () => {
      const res = await createApp({ handlers: handlers.slice(0, 1) }).request('/logout', {
        method: 'DELETE',
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
    });

    it('should still redirect when the request was handled after validation', async () => {
      const res = await createApp({ handlers: handlers.slice(2, 3) }).request(
        query({ post_logout_redirect_uri: REDIRECT_URI, state: 'abc' })
      );

      expect(res.status).toBe(302);
      expect(res.headers.get('Location')).toBe(
        `${REDIRECT_URI}?name=Bob+le+Magnifique&state=abc`
      );
    });
  });

  describe('skipRequest', () => {
    it('should skip the method check when extract is skipped', async () => {
      const res = await createApp({
        handlers: [{ name: 'skip', stage: 'extract', handle: (c) => c.skipRequest() }],
      }).request('/logout', { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
    });

    it('should skip redirect URI validation when validate is skipped', async () => {
      const res = await createApp({
        handlers: [{ name: 'skip', stage: 'validate', handle: (c) => c.skipRequest() }],
      }).request(query({ post_logout_redirect_uri: 'relative/path' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
    });

    it('should not redirect when applyResponse is skipped', async () => {
      const res = await createApp({
        handlers: [{ name: 'skip', stage: 'applyResponse', handle: (c) => c.skipRequest() }],
      }).request(query({ post_logout_redirect_uri: REDIRECT_URI, state: 'abc' }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({});
    });
  });

  describe('custom response', () => {
    it('should emit a custom_response object as the body', async () => {
      const res = await createApp({
        handlers: [
          {
            name: 'custom-response',
            stage: 'handle',
            handle: (c) => {
              c.transaction.setProperty('custom_response', { name: 'Bob le Bricoleur' });
            },
          },
        ],
      }).request(query({ post_logout_redirect_uri: REDIRECT_URI }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ name: 'Bob le Bricoleur' });
    });
  });

  describe('handler faults', () => {
    it('should return a server error when a handler throws', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});

      const res = await createApp({
        handlers: [
          {
            name: 'faulty',
            stage: 'handle',
            handle: async () => {
              throw new Error('session store unavailable');
            },
          },
        ],
      }).request(query({ post_logout_redirect_uri: REDIRECT_URI }));

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual(SERVER_ERROR_BODY);
    });
  });

  describe('cancellation', () => {
    it('should answer 499 when the client goes away', async () => {
      const controller = new AbortController();

      const res = await createApp({
        handlers: [{ name: 'abort', stage: 'validate', handle: () => controller.abort() }],
      }).request('/logout', { signal: controller.signal });

      expect(res.status).toBe(499);
    });

    it('should reject process() with PipelineCancelledError', async () => {
      const controller = new AbortController();
      controller.abort();
      const endpoint = new LogoutEndpoint({ applications: store });

      await expect(
        endpoint.process(new Request('https://op.example.com/logout'), { signal: controller.signal })
      ).rejects.toThrow(PipelineCancelledError);
    });
  });

  describe('routing', () => {
    it('should serve every configured path', async () => {
      const app = createApp({ endpointPaths: ['/connect/logout', '/signout'] });

      expect((await app.request('/connect/logout')).status).toBe(200);
      expect((await app.request('/signout')).status).toBe(200);

      const missing = await app.request('/logout');
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: 'not_found' });
    });

    it('should answer a generic server error when processing fails outside the pipeline', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const endpoint = new LogoutEndpoint({ applications: store });
      vi.spyOn(endpoint, 'process').mockRejectedValue(new Error('storage offline'));

      const res = await createLogoutApp(endpoint).request('/logout');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual(SERVER_ERROR_BODY);
    });
  });
});

describe('LogoutEndpoint', () => {
  it('should require an application resolver outside degraded mode', () => {
    expect(() => new LogoutEndpoint()).toThrow(
      'An application resolver is required unless degraded mode is enabled'
    );
  });

  it('should reject paths without a leading slash', () => {
    expect(() => new LogoutEndpoint({ degradedMode: true, endpointPaths: ['logout'] })).toThrow(
      "Logout endpoint path 'logout' must start with '/'"
    );
  });

  it('should deduplicate paths', () => {
    const endpoint = new LogoutEndpoint({ degradedMode: true, endpointPaths: ['/a', '/a', '/b'] });

    expect(endpoint.paths).toEqual(['/a', '/b']);
  });

  it('should refuse registrations once a request was processed', async () => {
    const endpoint = new LogoutEndpoint({ degradedMode: true });
    endpoint.register({ name: 'before', stage: 'handle', handle: () => {} });

    await endpoint.process(new Request('https://op.example.com/logout'));

    expect(endpoint.registry.isSealed).toBe(true);
    expect(() => endpoint.register({ name: 'after', stage: 'handle', handle: () => {} })).toThrow(
      InvalidOperationError
    );
    expect(() => endpoint.remove('before')).toThrow(InvalidOperationError);
  });
});
