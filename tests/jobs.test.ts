import test from 'node:test';
import assert from 'node:assert/strict';
import { computeJobTotal, createJob, deleteJob, updateJob } from '@/lib/mutations/jobs';
import { getJobById, listJobs } from '@/lib/queries/jobs';
import { seedClient, seedJob, setupTestDb, unwrap } from './helpers/testDb';

test('computeJobTotal multiplies hours by rate', () => {
  assert.equal(computeJobTotal(3, 100), 300);
  assert.equal(computeJobTotal(1.5, 80), 120);
  assert.equal(computeJobTotal(0, 140), 0);
});

test('a new job takes the client rate and starts as a draft invoice', async () => {
  const { settings } = await setupTestDb();
  const client = await seedClient(settings);

  const job = await seedJob(client.id);
  assert.equal(job.hourlyRate, 100);
  assert.equal(job.hours, 3);
  assert.equal(job.total, 300);
  assert.equal(job.invoiceNumber, 1);
  assert.equal(job.status, 'draft');
  assert.equal(job.invoiceStatus, 'draft');
  assert.equal(job.invoiceSentDate, null);
  assert.equal(job.invoicePaidDate, null);
});

test('an explicit rate overrides the client rate', async () => {
  const { settings } = await setupTestDb();
  const client = await seedClient(settings);

  const job = await seedJob(client.id, { hours: '2.5', hourly_rate: '120' });
  assert.equal(job.hourlyRate, 120);
  assert.equal(job.total, 300);
});

test('missing hours count as zero', async () => {
  const { settings } = await setupTestDb();
  const client = await seedClient(settings);

  const job = unwrap(
    await createJob({ client_id: client.id, job_date: '2026-04-02', description: 'Phone consult' })
  );
  assert.equal(job.hours, 0);
  assert.equal(job.total, 0);
});

test('a job for an unknown client is rejected', async () => {
  await setupTestDb();

  const result = await createJob({ client_id: 99, job_date: '2026-04-02', description: 'Orphan', hours: 1 });
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, 'VALIDATION_ERROR');
    assert.equal(result.error.message, 'Client not found');
  }
});

test('job dates must be YYYY-MM-DD', async () => {
  const { settings } = await setupTestDb();
  const client = await seedClient(settings);

  const result = await createJob({ client_id: client.id, job_date: '04/02/2026', description: 'Setup', hours: 1 });
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.message, 'job_date: Expected a date in YYYY-MM-DD format');
  }
});

test('update recomputes the total and keeps the rate when none is sent', async () => {
  const { settings } = await setupTestDb();
  const client = await seedClient(settings);
  const job = await seedJob(client.id, { hourly_rate: 90 });

  const updated = unwrap(
    await updateJob(job.id, { job_date: '2026-04-03', description: 'Network setup, part 2', hours: 4 })
  );
  assert.equal(updated.hourlyRate, 90);
  assert.equal(updated.total, 360);
  assert.equal(updated.jobDate, '2026-04-03');
  assert.equal(updated.status, 'draft');
  assert.equal(updated.invoiceNumber, job.invoiceNumber);

  const rerated = unwrap(
    await updateJob(job.id, {
      job_date: '2026-04-03',
      description: 'Network setup, part 2',
      hours: 4,
      hourly_rate: 110,
      status: 'completed',
    })
  );
  assert.equal(rerated.total, 440);
  assert.equal(rerated.status, 'completed');
});

test('updating a missing job is NOT_FOUND', async () => {
  await setupTestDb();

  const result = await updateJob(12, { job_date: '2026-04-03', description: 'Ghost', hours: 1 });
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, 'NOT_FOUND');
    assert.equal(result.error.message, 'Job not found');
  }
});

test('deleting reports whether a row went away', async () => {
  const { settings } = await setupTestDb();
  const client = await seedClient(settings);
  const job = await seedJob(client.id);

  assert.deepEqual(unwrap(await deleteJob(job.id)), { deleted: true });
  assert.deepEqual(unwrap(await deleteJob(job.id)), { deleted: false });

  const read = await getJobById(job.id);
  assert.equal(read.ok, false);
});

test('jobs list newest first and filter by client', async () => {
  const { settings } = await setupTestDb();
  const acme = await seedClient(settings);
  const zeta = await seedClient(settings, { name: 'Zeta Labs', hourly_rate: 80 });

  await seedJob(acme.id, { job_date: '2026-01-05', description: 'January audit' });
  await seedJob(zeta.id, { job_date: '2026-03-01', description: 'March rollout' });
  await seedJob(acme.id, { job_date: '2026-02-11', description: 'February patching' });

  const all = unwrap(await listJobs());
  assert.deepEqual(
    all.map((job) => [job.jobDate, job.clientName]),
    [
      ['2026-03-01', 'Zeta Labs'],
      ['2026-02-11', 'Acme'],
      ['2026-01-05', 'Acme'],
    ]
  );

  const acmeOnly = unwrap(await listJobs({ clientId: acme.id }));
  assert.deepEqual(
    acmeOnly.map((job) => job.description),
    ['February patching', 'January audit']
  );
});

test('job detail carries the client contact fields', async () => {
  const { settings } = await setupTestDb();
  const client = await seedClient(settings, { email: 'ops@acme.test', address: '1 Acme Way' });
  const job = await seedJob(client.id);

  const detail = unwrap(await getJobById(job.id));
  assert.equal(detail.clientName, 'Acme');
  assert.equal(detail.clientEmail, 'ops@acme.test');
  assert.equal(detail.clientPhone, null);
  assert.equal(detail.clientAddress, '1 Acme Way');
});
