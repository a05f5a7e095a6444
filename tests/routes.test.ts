import test from 'node:test';
import assert from 'node:assert/strict';
import * as clientsRoute from '@/app/api/clients/route';
import * as clientRoute from '@/app/api/clients/[id]/route';
import * as jobsRoute from '@/app/api/jobs/route';
import * as jobRoute from '@/app/api/jobs/[id]/route';
import * as jobStatusRoute from '@/app/api/jobs/[id]/status/route';
import * as jobPdfRoute from '@/app/api/jobs/[id]/pdf/route';
import * as settingsRoute from '@/app/api/settings/route';
import * as goalsRoute from '@/app/api/goals/route';
import * as exportClientsRoute from '@/app/api/export/clients/route';
import { setupTestDb } from './helpers/testDb';

function jsonRequest(path: string, method: string, body?: unknown): Request {
  return new Request(`http://localhost${path}`, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

function withId(id: string) {
  return { params: Promise.resolve({ id }) };
}

async function readJson(res: Response): Promise<unknown> {
  return res.json();
}

test('client create, read and update', async () => {
  await setupTestDb();

  const created = await clientsRoute.POST(jsonRequest('/api/clients', 'POST', { name: 'Acme', hourly_rate: 100 }));
  assert.equal(created.status, 201);
  assert.deepEqual(await readJson(created), { success: true, id: 1 });

  const updated = await clientRoute.PUT(
    jsonRequest('/api/clients/1', 'PUT', { name: 'Acme', email: 'ops@acme.test', hourly_rate: 100 }),
    withId('1')
  );
  assert.equal(updated.status, 200);
  assert.deepEqual(await readJson(updated), { success: true });

  const read = await clientRoute.GET(jsonRequest('/api/clients/1', 'GET'), withId('1'));
  assert.equal(read.status, 200);
  const client = await readJson(read);
  assert.ok(client && typeof client === 'object');
  assert.equal(Reflect.get(client, 'name'), 'Acme');
  assert.equal(Reflect.get(client, 'email'), 'ops@acme.test');
  assert.equal(Reflect.get(client, 'hourly_rate'), 100);

  const list = await clientsRoute.GET(jsonRequest('/api/clients', 'GET'));
  const clients = await readJson(list);
  assert.ok(Array.isArray(clients));
  assert.equal(clients.length, 1);
});

test('client validation failures are 400 with success false', async () => {
  await setupTestDb();

  const res = await clientsRoute.POST(jsonRequest('/api/clients', 'POST', { email: 'ops@acme.test' }));
  assert.equal(res.status, 400);
  assert.deepEqual(await readJson(res), { success: false, error: 'name: Name is required' });
});

test('malformed JSON is a 400', async () => {
  await setupTestDb();

  const res = await clientsRoute.POST(
    new Request('http://localhost/api/clients', { method: 'POST', body: '{"name": ' })
  );
  assert.equal(res.status, 400);
  const body = await readJson(res);
  assert.ok(body && typeof body === 'object');
  assert.equal(Reflect.get(body, 'success'), false);
});

test('lookups of missing records are a bare 404 error', async () => {
  await setupTestDb();

  const missing = await clientRoute.GET(jsonRequest('/api/clients/999', 'GET'), withId('999'));
  assert.equal(missing.status, 404);
  assert.deepEqual(await readJson(missing), { error: 'Client not found' });

  const notAnId = await jobRoute.GET(jsonRequest('/api/jobs/abc', 'GET'), withId('abc'));
  assert.equal(notAnId.status, 404);
  assert.deepEqual(await readJson(notAnId), { error: 'Job not found' });

  const pdf = await jobPdfRoute.GET(jsonRequest('/api/jobs/3/pdf', 'GET'), withId('3'));
  assert.equal(pdf.status, 404);
  assert.deepEqual(await readJson(pdf), { error: 'Job not found' });
});

test('updating a missing client is a 404 with success false', async () => {
  await setupTestDb();

  const res = await clientRoute.PUT(jsonRequest('/api/clients/5', 'PUT', { name: 'Ghost' }), withId('5'));
  assert.equal(res.status, 404);
  assert.deepEqual(await readJson(res), { success: false, error: 'Client not found' });
});

test('job lifecycle through the API', async () => {
  await setupTestDb();
  await clientsRoute.POST(jsonRequest('/api/clients', 'POST', { name: 'Acme', hourly_rate: 100 }));

  const created = await jobsRoute.POST(
    jsonRequest('/api/jobs', 'POST', {
      client_id: 1,
      job_date: '2026-04-02',
      description: 'Network setup',
      hours: 3,
    })
  );
  assert.equal(created.status, 201);
  assert.deepEqual(await readJson(created), { success: true, id: 1, invoice_number: 1 });

  const list = await jobsRoute.GET(jsonRequest('/api/jobs?client_id=1', 'GET'));
  const jobs = await readJson(list);
  assert.ok(Array.isArray(jobs));
  assert.equal(jobs.length, 1);
  assert.equal(Reflect.get(jobs[0], 'client_name'), 'Acme');
  assert.equal(Reflect.get(jobs[0], 'total'), 300);

  const badStatus = await jobStatusRoute.PUT(
    jsonRequest('/api/jobs/1/status', 'PUT', { status: 'void' }),
    withId('1')
  );
  assert.equal(badStatus.status, 400);
  assert.deepEqual(await readJson(badStatus), {
    success: false,
    error: 'status: Status must be one of: draft, sent, paid',
  });

  const paid = await jobStatusRoute.PUT(jsonRequest('/api/jobs/1/status', 'PUT', { status: 'paid' }), withId('1'));
  assert.equal(paid.status, 200);
  assert.deepEqual(await readJson(paid), { success: true, invoice_number: 1, status: 'paid' });

  const detail = await jobRoute.GET(jsonRequest('/api/jobs/1', 'GET'), withId('1'));
  const job = await readJson(detail);
  assert.ok(job && typeof job === 'object');
  assert.equal(Reflect.get(job, 'invoice_status'), 'paid');
  assert.equal(Reflect.get(job, 'client_name'), 'Acme');

  const pdf = await jobPdfRoute.GET(jsonRequest('/api/jobs/1/pdf', 'GET'), withId('1'));
  assert.equal(pdf.status, 200);
  assert.equal(pdf.headers.get('Content-Type'), 'application/pdf');
  assert.equal(pdf.headers.get('Content-Disposition'), 'attachment; filename="Invoice-INV-0001.pdf"');
  const bytes = Buffer.from(await pdf.arrayBuffer());
  assert.equal(bytes.subarray(0, 5).toString('latin1'), '%PDF-');

  const removed = await jobRoute.DELETE(jsonRequest('/api/jobs/1', 'DELETE'), withId('1'));
  assert.deepEqual(await readJson(removed), { success: true });
  const removedAgain = await jobRoute.DELETE(jsonRequest('/api/jobs/1', 'DELETE'), withId('1'));
  assert.equal(removedAgain.status, 200);
  assert.deepEqual(await readJson(removedAgain), { success: true });
});

test('job list rejects a non-numeric client filter', async () => {
  await setupTestDb();

  const res = await jobsRoute.GET(jsonRequest('/api/jobs?client_id=abc', 'GET'));
  assert.equal(res.status, 400);
});

test('settings and goals', async () => {
  await setupTestDb();

  const settings = await settingsRoute.GET(jsonRequest('/api/settings', 'GET'));
  const body = await readJson(settings);
  assert.ok(body && typeof body === 'object');
  assert.equal(Reflect.get(body, 'company_name'), 'Your Company');
  assert.equal(Reflect.get(body, 'default_hourly_rate'), 140);

  const saved = await settingsRoute.PUT(
    jsonRequest('/api/settings', 'PUT', { company_name: 'Northwind Consulting', default_hourly_rate: 150 })
  );
  assert.deepEqual(await readJson(saved), { success: true });

  const goals = await goalsRoute.GET(jsonRequest('/api/goals', 'GET'));
  assert.deepEqual(await readJson(goals), {
    yearly_gross: 43500,
    yearly_net: 30000,
    monthly_gross: 3625,
    monthly_net: 2500,
    weekly_gross: 836.54,
    weekly_net: 576.92,
    daily_gross: 119.18,
    daily_net: 82.19,
    tax_rate: 0.31,
  });
});

test('client export downloads as CSV', async () => {
  await setupTestDb();

  const res = await exportClientsRoute.GET();
  assert.equal(res.status, 200);
  assert.equal(res.headers.get('Content-Type'), 'text/csv; charset=utf-8');
  assert.match(
    res.headers.get('Content-Disposition') ?? '',
    /^attachment; filename="clients_export_\d{8}_\d{6}\.csv"$/
  );
  assert.equal(await res.text(), 'ID,Name,Email,Phone,Address,Hourly Rate,Notes,Created At,Updated At\r\n');
});
