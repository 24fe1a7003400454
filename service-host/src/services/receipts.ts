/**
 * Receipts
 *
 * Builds the printable receipt for a payment and hands it to the configured
 * printer. The payment's receipt flag is flipped only after the printer
 * reports success; it never goes back.
 */

import { Database } from '../db/database.js';
import { getLogger } from '../utils/logger.js';
import { NotFound, toError } from '../utils/errors.js';
import { CurrencySettings } from '../utils/money.js';
import { ActorContext, requires } from './access.js';
import { AuditAction, AuditTrail } from './audit.js';
import { mapPaymentRow, PaymentRow } from './payments.js';

const logger = getLogger('Receipts');

export interface BusinessInfo {
  name: string;
  address: string;
  taxId: string;
}

export interface ReceiptPrinter {
  /** Resolves true when the printer accepted the job. */
  print(receipt: Receipt): Promise<boolean>;
}

/** Printer used when none is configured: every job is refused. */
export class UnconfiguredPrinter implements ReceiptPrinter {
  async print(receipt: Receipt): Promise<boolean> {
    logger.warn('No receipt printer configured', { paymentNumber: receipt.paymentNumber });
    return false;
  }
}

export class ReceiptService {
  private db: Database;
  private audit: AuditTrail;
  private printer: ReceiptPrinter;
  private business: BusinessInfo;
  private currency: CurrencySettings;
  private now: () => Date;

  constructor(
    db: Database,
    audit: AuditTrail,
    printer: ReceiptPrinter,
    options: { business: BusinessInfo; currency: CurrencySettings; now?: () => Date }
  ) {
    this.db = db;
    this.audit = audit;
    this.printer = printer;
    this.business = options.business;
    this.currency = options.currency;
    this.now = options.now ?? (() => new Date());
  }

  buildReceipt(paymentId: string): Receipt {
    const paymentRow = this.db.get<PaymentRow>('SELECT * FROM payments WHERE id = ?', [paymentId]);
    if (!paymentRow) {
      throw new NotFound('Payment', paymentId);
    }
    const payment = mapPaymentRow(paymentRow);

    const order = this.db.get<ReceiptOrderRow>(
      `SELECT o.id, o.order_number, o.subtotal, o.tax_amount, o.total_amount,
              t.number AS table_number, w.display_name AS waiter_name
       FROM orders o
       LEFT JOIN dining_tables t ON t.id = o.table_id
       LEFT JOIN users w ON w.id = o.waiter_id
       WHERE o.id = ?`,
      [payment.orderId]
    );
    if (!order) {
      throw new NotFound('Order', payment.orderId);
    }

    const items = this.db.all<{ product_name: string; quantity: number; unit_price: number; subtotal: number }>(
      `SELECT product_name, quantity, unit_price, subtotal FROM order_items
       WHERE order_id = ? ORDER BY created_at, rowid`,
      [order.id]
    );

    // Paid total as of this payment, so reprints of an early split payment show its own balance.
    const paid = this.db.get<{ total: number | null }>(
      `SELECT SUM(amount) AS total FROM payments
       WHERE order_id = ? AND (processed_at < ?
         OR (processed_at = ? AND rowid <= (SELECT rowid FROM payments WHERE id = ?)))`,
      [order.id, payment.processedAt, payment.processedAt, payment.id]
    );
    const paidTotal = paid?.total ?? 0;

    const cashier = this.db.get<{ display_name: string }>('SELECT display_name FROM users WHERE id = ?', [
      payment.processedBy,
    ]);

    return {
      business: this.business,
      currency: this.currency,
      orderNumber: order.order_number,
      paymentNumber: payment.paymentNumber,
      tableNumber: order.table_number,
      waiterName: order.waiter_name ?? '',
      cashierName: cashier?.display_name ?? '',
      items: items.map(item => ({
        name: item.product_name,
        quantity: item.quantity,
        unitPrice: item.unit_price,
        subtotal: item.subtotal,
      })),
      subtotal: order.subtotal,
      tax: order.tax_amount,
      total: order.total_amount,
      method: payment.method,
      transactionReference: payment.transactionReference,
      amount: payment.amount,
      paidTotal,
      balance: Math.max(order.total_amount - paidTotal, 0),
      processedAt: payment.processedAt,
    };
  }

  /**
   * Prints the receipt and marks the payment printed on success.
   * Printer failures are reported as `printed: false`, never thrown.
   */
  async printReceipt(ctx: ActorContext, paymentId: string): Promise<PrintOutcome> {
    requires(ctx.user, 'PAYMENT');
    const receipt = this.buildReceipt(paymentId);

    let printed = false;
    try {
      printed = await this.printer.print(receipt);
    } catch (e) {
      logger.error('Receipt print failed', toError(e), { paymentNumber: receipt.paymentNumber });
    }

    if (!printed) {
      return { printed: false, receipt };
    }

    const printedAt = this.now().toISOString();
    this.db.transaction(() => {
      const result = this.db.run(
        'UPDATE payments SET receipt_printed = 1, receipt_printed_at = ? WHERE id = ? AND receipt_printed = 0',
        [printedAt, paymentId]
      );
      if (result.changes > 0) {
        this.audit.recordFor(ctx, AuditAction.USER_ACTION, `Printed receipt ${receipt.paymentNumber}`, {
          tableName: 'payments',
          recordId: paymentId,
        });
      }
    });

    logger.info('Receipt printed', { paymentNumber: receipt.paymentNumber, deviceId: ctx.deviceId });
    return { printed: true, receipt };
  }
}

interface ReceiptLine {
  name: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
}

interface Receipt {
  business: BusinessInfo;
  currency: CurrencySettings;
  orderNumber: string;
  paymentNumber: string;
  tableNumber: string | null;
  waiterName: string;
  cashierName: string;
  items: ReceiptLine[];
  subtotal: number;
  tax: number;
  total: number;
  method: string;
  transactionReference: string;
  amount: number;
  paidTotal: number;
  balance: number;
  processedAt: string;
}

interface PrintOutcome {
  printed: boolean;
  receipt: Receipt;
}

interface ReceiptOrderRow {
  id: string;
  order_number: string;
  subtotal: number;
  tax_amount: number;
  total_amount: number;
  table_number: string | null;
  waiter_name: string | null;
}

export type { Receipt, ReceiptLine, PrintOutcome };
