import * as clientsRoute from '@/app/api/clients/route';
import * as clientRoute from '@/app/api/clients/[id]/route';
import * as jobsRoute from '@/app/api/jobs/route';
import * as jobRoute from '@/app/api/jobs/[id]/route';
import * as jobStatusRoute from '@/app/api/jobs/[id]/status/route';
import * as jobPdfRoute from '@/app/api/jobs/[id]/pdf/route';
import * as statsRoute from '@/app/api/stats/route';
import * as settingsRoute from '@/app/api/settings/route';
import * as goalsRoute from '@/app/api/goals/route';
import * as exportClientsRoute from '@/app/api/export/clients/route';
import * as exportJobsRoute from '@/app/api/export/jobs/route';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export type RouteContext = {
  params: Promise<Record<string, string>>;
};

/**
 * Handlers exported by a route.ts module under app/api, keyed by method.
 */
export interface RouteModule {
  GET?(req: Request, context: RouteContext): Promise<Response>;
  POST?(req: Request, context: RouteContext): Promise<Response>;
  PUT?(req: Request, context: RouteContext): Promise<Response>;
  DELETE?(req: Request, context: RouteContext): Promise<Response>;
}

export type RouteDefinition = {
  /** Path with `[name]` segments, mirroring the directory layout under app/. */
  pattern: string;
  module: RouteModule;
};

type CompiledRoute = RouteDefinition & {
  regex: RegExp;
  keys: string[];
};

export type RouteMatch = {
  route: RouteDefinition;
  params: Record<string, string>;
};

export const API_ROUTES: RouteDefinition[] = [
  { pattern: '/api/clients', module: clientsRoute },
  { pattern: '/api/clients/[id]', module: clientRoute },
  { pattern: '/api/jobs', module: jobsRoute },
  { pattern: '/api/jobs/[id]', module: jobRoute },
  { pattern: '/api/jobs/[id]/status', module: jobStatusRoute },
  { pattern: '/api/jobs/[id]/pdf', module: jobPdfRoute },
  { pattern: '/api/stats', module: statsRoute },
  { pattern: '/api/settings', module: settingsRoute },
  { pattern: '/api/goals', module: goalsRoute },
  { pattern: '/api/export/clients', module: exportClientsRoute },
  { pattern: '/api/export/jobs', module: exportJobsRoute },
];

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function compileRoute(route: RouteDefinition): CompiledRoute {
  const keys: string[] = [];
  const source = route.pattern
    .split('/')
    .map((segment) => {
      const param = /^\[(\w+)\]$/.exec(segment);
      if (!param) return escapeRegex(segment);
      keys.push(param[1]);
      return '([^/]+)';
    })
    .join('/');

  return { ...route, regex: new RegExp(`^${source}/?$`), keys };
}

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

export function createRouter(routes: RouteDefinition[] = API_ROUTES) {
  const compiled = routes.map(compileRoute);

  function match(pathname: string): RouteMatch | null {
    for (const route of compiled) {
      const found = route.regex.exec(pathname);
      if (!found) continue;
      const params: Record<string, string> = {};
      for (const [index, key] of route.keys.entries()) {
        const decoded = decodeSegment(found[index + 1] ?? '');
        // A segment with broken percent-encoding cannot name a record.
        if (decoded === null) return null;
        params[key] = decoded;
      }
      return { route, params };
    }
    return null;
  }

  /**
   * Dispatches a request to the route module for its path. Unknown paths get
   * 404, known paths without a handler for the method get 405.
   */
  async function handle(req: Request): Promise<Response> {
    const { pathname } = new URL(req.url);
    const matched = match(pathname);
    if (!matched) {
      return Response.json({ error: 'Not found' }, { status: 404 });
    }

    const method = req.method.toUpperCase();
    const handler = isHttpMethod(method) ? matched.route.module[method] : undefined;
    if (!handler) {
      return Response.json({ error: 'Method not allowed' }, { status: 405 });
    }

    return handler(req, { params: Promise.resolve(matched.params) });
  }

  return { match, handle };
}
