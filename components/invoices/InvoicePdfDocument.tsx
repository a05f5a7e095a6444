import { Document, Page, StyleSheet, Text, View } from '@react-pdf/renderer';
import type { InvoiceDocumentData } from '@/lib/invoices/document';

type InvoicePdfDocumentProps = {
  data: InvoiceDocumentData;
};

const ACCENT = '#0066cc';

const styles = StyleSheet.create({
  page: {
    paddingVertical: 36,
    paddingHorizontal: 36,
    fontSize: 10,
    fontFamily: 'Helvetica',
    color: '#0f172a',
    position: 'relative',
  },
  header: {
    flexDirection: 'row',
    justifyContent: 'space-between',
    alignItems: 'flex-start',
  },
  companyName: {
    fontSize: 22,
    fontFamily: 'Helvetica-Bold',
    color: ACCENT,
  },
  invoiceTitleBlock: {
    alignItems: 'flex-end',
  },
  invoiceTitle: {
    fontSize: 24,
    fontFamily: 'Helvetica-Bold',
    letterSpacing: 1,
    color: '#1f2937',
  },
  invoiceNumber: {
    fontSize: 11,
    color: '#475569',
    marginTop: 2,
  },
  contactLines: {
    marginTop: 6,
  },
  contactLine: {
    fontSize: 9,
    color: '#475569',
    marginBottom: 2,
  },
  section: {
    marginTop: 20,
  },
  sectionTitle: {
    fontSize: 11,
    fontFamily: 'Helvetica-Bold',
    color: ACCENT,
    marginBottom: 6,
  },
  metaRow: {
    flexDirection: 'row',
    marginBottom: 3,
  },
  metaLabel: {
    width: 90,
    fontSize: 9,
    color: ACCENT,
  },
  metaValue: {
    fontSize: 9,
    color: '#1f2937',
  },
  billToLine: {
    fontSize: 10,
    marginBottom: 2,
  },
  table: {
    borderWidth: 1,
    borderColor: '#e2e8f0',
  },
  tableHeader: {
    flexDirection: 'row',
    backgroundColor: '#f8fafc',
    borderBottomWidth: 1,
    borderBottomColor: ACCENT,
    paddingVertical: 6,
    paddingHorizontal: 8,
  },
  tableRow: {
    flexDirection: 'row',
    paddingVertical: 6,
    paddingHorizontal: 8,
  },
  noteRow: {
    paddingBottom: 6,
    paddingHorizontal: 8,
    fontSize: 8,
    color: '#64748b',
  },
  headerCell: {
    fontFamily: 'Helvetica-Bold',
    color: ACCENT,
  },
  cellDescription: {
    flex: 3,
  },
  cellHours: {
    flex: 1,
    textAlign: 'right',
  },
  cellRate: {
    flex: 1.2,
    textAlign: 'right',
  },
  cellAmount: {
    flex: 1.2,
    textAlign: 'right',
  },
  totalsWrap: {
    marginTop: 14,
    alignItems: 'flex-end',
  },
  totalsCard: {
    width: 220,
  },
  totalsRow: {
    flexDirection: 'row',
    justifyContent: 'space-between',
    marginBottom: 4,
  },
  totalsLabel: {
    color: '#64748b',
  },
  totalDivider: {
    height: 2,
    backgroundColor: ACCENT,
    marginVertical: 4,
  },
  totalDue: {
    fontSize: 11,
    fontFamily: 'Helvetica-Bold',
    color: ACCENT,
  },
  footer: {
    marginTop: 32,
    alignItems: 'center',
  },
  footerText: {
    fontSize: 9,
    color: '#64748b',
    marginBottom: 2,
  },
  watermark: {
    position: 'absolute',
    top: 330,
    left: 0,
    right: 0,
    textAlign: 'center',
    fontSize: 120,
    fontFamily: 'Helvetica-Bold',
    color: '#16a34a',
    opacity: 0.15,
    transform: 'rotate(-35deg)',
  },
});

function MetaRow({ label, value }: { label: string; value: string }) {
  return (
    <View style={styles.metaRow}>
      <Text style={styles.metaLabel}>{label}</Text>
      <Text style={styles.metaValue}>{value}</Text>
    </View>
  );
}

export default function InvoicePdfDocument({ data }: InvoicePdfDocumentProps) {
  return (
    <Document title={`Invoice ${data.invoice.number}`} author={data.company.name}>
      <Page size="LETTER" style={styles.page}>
        {data.watermark ? (
          <Text fixed style={styles.watermark}>
            {data.watermark}
          </Text>
        ) : null}

        <View style={styles.header}>
          <Text style={styles.companyName}>{data.company.name}</Text>
          <View style={styles.invoiceTitleBlock}>
            <Text style={styles.invoiceTitle}>INVOICE</Text>
            <Text style={styles.invoiceNumber}>{data.invoice.number}</Text>
          </View>
        </View>
        <View style={styles.contactLines}>
          {data.company.contactLines.map((line, index) => (
            <Text key={`${index}-${line}`} style={styles.contactLine}>
              {line}
            </Text>
          ))}
        </View>

        <View style={styles.section}>
          <MetaRow label="Invoice #:" value={data.invoice.number} />
          <MetaRow label="Invoice Date:" value={data.invoice.invoiceDate} />
          <MetaRow label="Service Date:" value={data.invoice.serviceDate} />
          <MetaRow label="Status:" value={data.invoice.status} />
        </View>

        <View style={styles.section}>
          <Text style={styles.sectionTitle}>Bill To</Text>
          {data.billTo.map((line, index) => (
            <Text key={`${index}-${line}`} style={styles.billToLine}>
              {line}
            </Text>
          ))}
        </View>

        <View style={styles.section}>
          <View style={styles.table}>
            <View style={styles.tableHeader}>
              <Text style={[styles.headerCell, styles.cellDescription]}>Description</Text>
              <Text style={[styles.headerCell, styles.cellHours]}>Hours</Text>
              <Text style={[styles.headerCell, styles.cellRate]}>Rate</Text>
              <Text style={[styles.headerCell, styles.cellAmount]}>Amount</Text>
            </View>
            {data.lineItems.map((item, index) => (
              <View key={`${item.description}-${index}`}>
                <View style={styles.tableRow} wrap={false}>
                  <Text style={styles.cellDescription}>{item.description}</Text>
                  <Text style={styles.cellHours}>{item.hours}</Text>
                  <Text style={styles.cellRate}>{item.rate}</Text>
                  <Text style={styles.cellAmount}>{item.amount}</Text>
                </View>
                {item.note ? <Text style={styles.noteRow}>Note: {item.note}</Text> : null}
              </View>
            ))}
          </View>
        </View>

        <View style={styles.totalsWrap}>
          <View style={styles.totalsCard}>
            <View style={styles.totalsRow}>
              <Text style={styles.totalsLabel}>Subtotal:</Text>
              <Text>{data.totals.subtotal}</Text>
            </View>
            <View style={styles.totalsRow}>
              <Text style={styles.totalsLabel}>{data.totals.taxLabel}:</Text>
              <Text>{data.totals.tax}</Text>
            </View>
            <View style={styles.totalDivider} />
            <View style={styles.totalsRow}>
              <Text style={styles.totalDue}>Total Due:</Text>
              <Text style={styles.totalDue}>{data.totals.totalDue}</Text>
            </View>
          </View>
        </View>

        <View style={styles.footer}>
          <Text style={styles.footerText}>{data.footer.thanks}</Text>
          <Text style={styles.footerText}>{data.footer.tagline}</Text>
        </View>
      </Page>
    </Document>
  );
}
