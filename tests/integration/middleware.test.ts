import { describe, it, expect, beforeAll } from 'vitest';
import { buildRouteTable, declareMiddleware, declareRoute } from '@scopewise/router';
import type { Declaration, Transform } from '@scopewise/router';
import { deny, respond, tag, TestTransport } from './setup.js';
import type { Handler } from './setup.js';

describe('Middleware - overlay and override', () => {
  // ============================================================================
  // Composition through a transport
  // ============================================================================

  describe('through a transport', () => {
    const transport = new TestTransport();

    const declarations: Declaration<Handler, Transform<Handler>>[] = [
      declareMiddleware('', tag('cors')),
      declareRoute('', 'index.get', respond('home')),
      declareMiddleware('api', tag('auth')),
      declareRoute('api/users', '[id].get', respond('getUser')),
      declareMiddleware('api/users', tag('audit')),
      declareMiddleware('api/public', tag('rateLimit'), 'override'),
      declareRoute('api/public', 'health.get', respond('health')),
      declareMiddleware('admin', deny(403)),
      declareRoute('admin', 'index.get', respond('admin')),
    ];

    beforeAll(() => {
      expect(transport.mount(buildRouteTable(declarations))).toBe(4);
    });

    it('should run inherited middleware root first', () => {
      expect(transport.dispatch('GET', '/api/users/9')).toEqual({
        status: 200,
        body: { route: 'getUser', params: { id: '9' }, trail: ['cors', 'auth', 'audit'] },
      });
    });

    it('should run only the override chain below an override scope', () => {
      expect(transport.dispatch('GET', '/api/public/health')).toEqual({
        status: 200,
        body: { route: 'health', params: {}, trail: ['rateLimit'] },
      });
    });

    it('should not leak middleware into sibling scopes', () => {
      expect(transport.dispatch('GET', '/')).toEqual({
        status: 200,
        body: { route: 'home', params: {}, trail: ['cors'] },
      });
    });

    it('should let middleware answer before the handler', () => {
      expect(transport.dispatch('GET', '/admin')).toEqual({ status: 403, body: { error: 'denied' } });
    });

    it('should answer 405 and 404 for unmatched requests', () => {
      expect(transport.dispatch('POST', '/api/users/9')).toEqual({ status: 405, body: { allow: ['GET'] } });
      expect(transport.dispatch('GET', '/missing')).toEqual({ status: 404, body: null });
    });
  });

  // ============================================================================
  // Nested overrides
  // ============================================================================

  it('should overlay onto an override further down', () => {
    const transport = new TestTransport();
    transport.mount(
      buildRouteTable<Handler, Transform<Handler>>([
        declareMiddleware('', tag('A')),
        declareMiddleware('api', tag('B')),
        declareMiddleware('api/v2', tag('C'), 'override'),
        declareMiddleware('api/v2/beta', tag('D')),
        declareRoute('api/v2/beta', 'flags.get', respond('flags')),
      ])
    );

    expect(transport.dispatch('GET', '/api/v2/beta/flags').body).toEqual({
      route: 'flags',
      params: {},
      trail: ['C', 'D'],
    });
  });
});
