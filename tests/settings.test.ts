import test from 'node:test';
import assert from 'node:assert/strict';
import { initDb } from '@/lib/db';
import { updateCompanySettings } from '@/lib/mutations/settings';
import { getCompanySettings } from '@/lib/queries/settings';
import { defaultHourlyRate, FALLBACK_HOURLY_RATE, getAppSettings } from '@/lib/settings/appSettings';
import { computeGoalsBreakdown } from '@/lib/financials/goals';
import { GOALS_SEED } from '@/lib/db/migrate';
import { setupTestDb, unwrap } from './helpers/testDb';

test('settings update replaces every field', async () => {
  await setupTestDb();

  const updated = unwrap(
    await updateCompanySettings({
      company_name: 'Northwind Consulting',
      owner_name: 'Sam Lee',
      address: '',
      phone: '555-0199',
      email: 'sam@northwind.test',
      default_hourly_rate: '160',
    })
  );
  assert.equal(updated.companyName, 'Northwind Consulting');
  assert.equal(updated.ownerName, 'Sam Lee');
  assert.equal(updated.address, '');
  assert.equal(updated.phone, '555-0199');
  assert.equal(updated.email, 'sam@northwind.test');
  assert.equal(updated.defaultHourlyRate, 160);

  const stored = unwrap(await getCompanySettings());
  assert.equal(stored?.companyName, 'Northwind Consulting');
});

test('omitted rate falls back to the built-in default', async () => {
  await setupTestDb();

  const updated = unwrap(await updateCompanySettings({ company_name: 'Northwind Consulting' }));
  assert.equal(updated.defaultHourlyRate, FALLBACK_HOURLY_RATE);
  assert.equal(updated.ownerName, '');
});

test('company name is required', async () => {
  await setupTestDb();

  const result = await updateCompanySettings({ owner_name: 'Sam Lee' });
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.error.code, 'VALIDATION_ERROR');
    assert.equal(result.error.message, 'company_name: Company name is required');
  }
});

test('an update refreshes the loaded settings', async () => {
  await setupTestDb();
  assert.equal(defaultHourlyRate(unwrap(await getAppSettings())), 140);

  unwrap(await updateCompanySettings({ company_name: 'Northwind Consulting', default_hourly_rate: 175 }));

  const settings = unwrap(await getAppSettings());
  assert.equal(settings.company?.companyName, 'Northwind Consulting');
  assert.equal(defaultHourlyRate(settings), 175);
});

test('settings reload when the database changes', async () => {
  await setupTestDb();
  unwrap(await updateCompanySettings({ company_name: 'Northwind Consulting' }));

  initDb(':memory:');
  const settings = unwrap(await getAppSettings());
  assert.equal(settings.company?.companyName, 'Your Company');
});

test('rate falls back when no settings row exists', () => {
  assert.equal(defaultHourlyRate({ company: null, goals: { ...GOALS_SEED } }), 140);
});

test('goals break down into month, week and day targets', () => {
  assert.deepEqual(computeGoalsBreakdown(GOALS_SEED), {
    yearlyGross: 43500,
    yearlyNet: 30000,
    monthlyGross: 3625,
    monthlyNet: 2500,
    weeklyGross: 836.54,
    weeklyNet: 576.92,
    dailyGross: 119.18,
    dailyNet: 82.19,
    taxRate: 0.31,
  });
});
