import test from 'node:test';
import assert from 'node:assert/strict';
import { compileRoute, createRouter, type RouteModule } from '@/lib/http/router';
import { setupTestDb } from './helpers/testDb';

test('paths resolve to the route that owns them', () => {
  const router = createRouter();

  const pdf = router.match('/api/jobs/7/pdf');
  assert.equal(pdf?.route.pattern, '/api/jobs/[id]/pdf');
  assert.deepEqual(pdf?.params, { id: '7' });

  const job = router.match('/api/jobs/7');
  assert.equal(job?.route.pattern, '/api/jobs/[id]');

  const clients = router.match('/api/clients/');
  assert.equal(clients?.route.pattern, '/api/clients');
  assert.deepEqual(clients?.params, {});

  assert.equal(router.match('/api/invoices'), null);
  assert.equal(router.match('/api/jobs/7/pdf/extra'), null);
});

test('route patterns compile to anchored expressions', () => {
  const compiled = compileRoute({ pattern: '/api/export/[kind]', module: {} });
  assert.deepEqual(compiled.keys, ['kind']);
  assert.equal(compiled.regex.test('/api/export/jobs'), true);
  assert.equal(compiled.regex.test('/api/export/jobs/all'), false);
  assert.equal(compiled.regex.test('/v2/api/export/jobs'), false);
});

test('unknown paths are 404 and unsupported methods are 405', async () => {
  await setupTestDb();
  const router = createRouter();

  const unknown = await router.handle(new Request('http://localhost/api/invoices'));
  assert.equal(unknown.status, 404);
  assert.deepEqual(await unknown.json(), { error: 'Not found' });

  const patch = await router.handle(new Request('http://localhost/api/clients', { method: 'PATCH' }));
  assert.equal(patch.status, 405);
  assert.deepEqual(await patch.json(), { error: 'Method not allowed' });

  const deleteClient = await router.handle(new Request('http://localhost/api/clients/1', { method: 'DELETE' }));
  assert.equal(deleteClient.status, 405);
});

test('path parameters reach the handler decoded', async () => {
  const echo: RouteModule = {
    async GET(_req, context) {
      return Response.json(await context.params);
    },
  };
  const router = createRouter([{ pattern: '/api/echo/[name]', module: echo }]);

  const res = await router.handle(new Request('http://localhost/api/echo/a%20b'));
  assert.deepEqual(await res.json(), { name: 'a b' });
});

test('dispatches to the stats route', async () => {
  await setupTestDb();
  const router = createRouter();

  const res = await router.handle(new Request('http://localhost/api/stats'));
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), {
    total_revenue: 0,
    total_hours: 0,
    total_clients: 0,
    total_jobs: 0,
    year_revenue: 0,
    month_revenue: 0,
    week_revenue: 0,
  });
});

test('malformed percent-encoding in a path segment is a 404', async () => {
  const router = createRouter();

  assert.equal(router.match('/api/jobs/%E0'), null);

  const res = await router.handle(new Request('http://localhost/api/jobs/%E0'));
  assert.equal(res.status, 404);
  assert.deepEqual(await res.json(), { error: 'Not found' });
});
