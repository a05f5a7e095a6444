import type { Client } from '@/db/schema/clients';
import type { Job } from '@/db/schema/jobs';
import type { CompanySettings } from '@/db/schema/company_settings';
import type { JobWithClient, JobWithClientName } from '@/lib/queries/jobs';
import type { DashboardStats } from '@/lib/queries/dashboard';
import type { GoalsBreakdown } from '@/lib/financials/goals';

// Wire format: snake_case field names matching the table columns.

export function toClientJson(client: Client) {
  return {
    id: client.id,
    name: client.name,
    email: client.email,
    phone: client.phone,
    address: client.address,
    hourly_rate: client.hourlyRate,
    notes: client.notes,
    created_at: client.createdAt,
    updated_at: client.updatedAt,
  };
}

export function toJobJson(job: Job) {
  return {
    id: job.id,
    client_id: job.clientId,
    job_date: job.jobDate,
    description: job.description,
    hours: job.hours,
    hourly_rate: job.hourlyRate,
    total: job.total,
    notes: job.notes,
    status: job.status,
    invoice_number: job.invoiceNumber,
    invoice_status: job.invoiceStatus,
    invoice_sent_date: job.invoiceSentDate,
    invoice_paid_date: job.invoicePaidDate,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
  };
}

export function toJobListItemJson(job: JobWithClientName) {
  return { ...toJobJson(job), client_name: job.clientName };
}

export function toJobDetailJson(job: JobWithClient) {
  return {
    ...toJobListItemJson(job),
    client_email: job.clientEmail,
    client_phone: job.clientPhone,
    client_address: job.clientAddress,
  };
}

export function toSettingsJson(settings: CompanySettings) {
  return {
    id: settings.id,
    company_name: settings.companyName,
    owner_name: settings.ownerName,
    address: settings.address,
    phone: settings.phone,
    email: settings.email,
    default_hourly_rate: settings.defaultHourlyRate,
    updated_at: settings.updatedAt,
  };
}

export function toStatsJson(stats: DashboardStats) {
  return {
    total_revenue: stats.totalRevenue,
    total_hours: stats.totalHours,
    total_clients: stats.totalClients,
    total_jobs: stats.totalJobs,
    year_revenue: stats.yearRevenue,
    month_revenue: stats.monthRevenue,
    week_revenue: stats.weekRevenue,
  };
}

export function toGoalsJson(goals: GoalsBreakdown) {
  return {
    yearly_gross: goals.yearlyGross,
    yearly_net: goals.yearlyNet,
    monthly_gross: goals.monthlyGross,
    monthly_net: goals.monthlyNet,
    weekly_gross: goals.weeklyGross,
    weekly_net: goals.weeklyNet,
    daily_gross: goals.dailyGross,
    daily_net: goals.dailyNet,
    tax_rate: goals.taxRate,
  };
}
