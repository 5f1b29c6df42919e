import { eq } from 'drizzle-orm';
import type { DbExecutor } from '@/app/lib/db';
import { invoices } from '@/app/lib/db/schema';
import { ConflictError } from '@/app/lib/errors';
import { CONSTRAINTS } from '@/app/lib/repositories/pg-errors';
import type { Invoice, InvoiceRepository, NewInvoice } from '@/app/lib/repositories/types';

export class DrizzleInvoiceRepository implements InvoiceRepository {
  constructor(private readonly db: DbExecutor) {}

  async findByExternalId(externalInvoiceId: string): Promise<Invoice | undefined> {
    const [invoice] = await this.db
      .select()
      .from(invoices)
      .where(eq(invoices.externalInvoiceId, externalInvoiceId))
      .limit(1);
    return invoice;
  }

  async insertIfAbsent(values: NewInvoice): Promise<Invoice> {
    const [inserted] = await this.db
      .insert(invoices)
      .values(values)
      .onConflictDoNothing({ target: invoices.externalInvoiceId })
      .returning();
    if (inserted) return inserted;

    const existing = await this.findByExternalId(values.externalInvoiceId);
    if (!existing) {
      throw new ConflictError(CONSTRAINTS.invoiceExternalId);
    }
    return existing;
  }
}
