/**
 * Gateway route table
 *
 * Templates are literal paths with `{name}` placeholders. A placeholder in
 * the last position captures the rest of the path, slashes included; any
 * other placeholder captures one segment. The route with the longest literal
 * prefix that matches the path decides the outcome, even when its verbs
 * exclude the request: a less specific route never picks the request up.
 */

import { ValidationError, isMethodAllowed } from '@schoolreg/core';
import type { HttpMethod, ServiceType } from '@schoolreg/types';

export interface RouteDefinition {
  upstreamPathTemplate: string;
  upstreamMethods: readonly HttpMethod[];
  pool: ServiceType;
  downstreamPathTemplate: string;
}

export type RouteMatch =
  | { kind: 'matched'; route: RouteDefinition; downstreamPath: string }
  | { kind: 'method_not_allowed'; route: RouteDefinition; allow: readonly HttpMethod[] }
  | { kind: 'not_found' };

interface CompiledRoute {
  route: RouteDefinition;
  pattern: RegExp;
  placeholders: string[];
  specificity: number;
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function literalPrefixLength(template: string): number {
  const index = template.indexOf('{');
  return index === -1 ? template.length : index;
}

function compileRoute(route: RouteDefinition): CompiledRoute {
  const template = route.upstreamPathTemplate;
  const placeholders: string[] = [];
  let source = '';
  let lastIndex = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    const name = match[1] ?? '';
    const isLast = index + match[0].length === template.length;
    source += escapeRegExp(template.slice(lastIndex, index));
    source += isLast ? '(.*)' : '([^/]+)';
    placeholders.push(name);
    lastIndex = index + match[0].length;
  }
  source += escapeRegExp(template.slice(lastIndex));

  return {
    route,
    pattern: new RegExp(`^${source}$`),
    placeholders,
    specificity: literalPrefixLength(template),
  };
}

function expandTemplate(template: string, values: ReadonlyMap<string, string>): string {
  return template.replace(PLACEHOLDER, (_whole, name: string) => values.get(name) ?? '');
}

export class RouteTable {
  private readonly compiled: CompiledRoute[];

  constructor(routes: readonly RouteDefinition[]) {
    // Stable sort keeps declaration order between equally specific routes
    this.compiled = routes
      .map(compileRoute)
      .sort((a, b) => b.specificity - a.specificity);
  }

  get routes(): RouteDefinition[] {
    return this.compiled.map((entry) => entry.route);
  }

  /**
   * Resolve a request path (without query string) and method
   */
  match(method: string, path: string): RouteMatch {
    const verb = method.toUpperCase();

    for (const entry of this.compiled) {
      const result = entry.pattern.exec(path);
      if (!result) continue;

      const { route } = entry;
      if (!route.upstreamMethods.some((allowed) => allowed === verb)) {
        return { kind: 'method_not_allowed', route, allow: route.upstreamMethods };
      }

      const values = new Map<string, string>();
      entry.placeholders.forEach((name, i) => values.set(name, result[i + 1] ?? ''));
      return {
        kind: 'matched',
        route,
        downstreamPath: expandTemplate(route.downstreamPathTemplate, values),
      };
    }

    return { kind: 'not_found' };
  }
}

/**
 * Reject tables that would send a verb to a pool whose service type refuses it
 */
export function validateRouteTable(routes: readonly RouteDefinition[]): void {
  const violations: string[] = [];

  for (const route of routes) {
    for (const method of route.upstreamMethods) {
      if (!isMethodAllowed(route.pool, method)) {
        violations.push(`${method} ${route.upstreamPathTemplate} -> ${route.pool} pool`);
      }
    }
  }

  if (violations.length > 0) {
    throw new ValidationError(
      `Route table sends verbs to pools that refuse them: ${violations.join('; ')}`,
      { violations },
      'INVALID_ROUTE_TABLE'
    );
  }
}
