import { initDb } from '@/lib/db';
import { listClients } from '@/lib/queries/clients';
import { createClient } from '@/lib/mutations/clients';
import { createJob } from '@/lib/mutations/jobs';
import { updateInvoiceStatus } from '@/lib/mutations/job_invoices';
import { loadAppSettings } from '@/lib/settings/appSettings';
import { addDays, toDateKey } from '@/lib/utils/dateKeys';

const SAMPLE_CLIENTS = [
  {
    name: 'Sample Manufacturing Co',
    email: 'accounts@sample-manufacturing.test',
    phone: '555-0110',
    address: '40 Industrial Way, Springfield',
    hourly_rate: 150,
  },
  {
    name: 'Sample Dental Group',
    email: 'office@sample-dental.test',
    phone: '555-0120',
    address: '8 Harbour Street, Springfield',
  },
];

async function seedDev() {
  console.log('🌱 Starting dev seed...');

  try {
    initDb();
    const settings = await loadAppSettings();
    if (!settings.ok) {
      console.error('❌ Failed to load settings:', settings.error);
      process.exit(1);
    }

    // Safe to re-run: skip when any client exists
    const existing = await listClients();
    if (existing.ok && existing.data.length > 0) {
      console.log(`✅ ${existing.data.length} clients already exist`);
      console.log('   Skipping seed (safe to re-run)');
      return;
    }

    const today = new Date();
    let jobCount = 0;

    for (const [index, clientData] of SAMPLE_CLIENTS.entries()) {
      const clientResult = await createClient(clientData, settings.data);
      if (!clientResult.ok) {
        console.error(`❌ Failed to create client "${clientData.name}":`, clientResult.error);
        process.exit(1);
      }
      const client = clientResult.data;
      console.log(`✅ Client created: ${client.name} (${client.hourlyRate}/hr)`);

      const jobResult = await createJob({
        client_id: client.id,
        job_date: toDateKey(addDays(today, -(index + 1) * 3)),
        description: 'On-site network review',
        hours: 2.5 + index,
        notes: 'Sample job for development testing',
      });
      if (!jobResult.ok) {
        console.error('❌ Failed to create job:', jobResult.error);
        process.exit(1);
      }
      jobCount += 1;
      console.log(`✅ Job created: #${jobResult.data.id} invoice ${jobResult.data.invoiceNumber}`);

      if (index === 0) {
        const paid = await updateInvoiceStatus(jobResult.data.id, { status: 'paid' });
        if (!paid.ok) {
          console.error('❌ Failed to mark invoice paid:', paid.error);
          process.exit(1);
        }
        console.log(`✅ Invoice ${paid.data.invoiceNumber} marked paid`);
      }
    }

    console.log('🎉 Dev seed completed successfully!');
    console.log(`   Clients created: ${SAMPLE_CLIENTS.length}`);
    console.log(`   Jobs created: ${jobCount}`);
  } catch (error) {
    console.error('❌ Seed failed:', error);
    process.exit(1);
  }
}

// Run seed
seedDev()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    console.error('❌ Unhandled error:', error);
    process.exit(1);
  });
