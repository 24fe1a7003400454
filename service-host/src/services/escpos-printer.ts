/**
 * ESC/POS Network Printer
 *
 * Renders receipts as ESC/POS command buffers and sends them to a thermal
 * printer over raw TCP (usually port 9100).
 */

import net from 'net';
import { getLogger } from '../utils/logger.js';
import { formatMoney } from '../utils/money.js';
import type { Receipt, ReceiptPrinter } from './receipts.js';

const logger = getLogger('EscPosPrinter');

const LINE_WIDTH = 32;

const ESC = 0x1b;
const GS = 0x1d;
const LF = 0x0a;

const Align = {
  LEFT: 0x00,
  CENTER: 0x01,
  RIGHT: 0x02,
} as const;

type Align = (typeof Align)[keyof typeof Align];

export interface NetworkPrinterConfig {
  host: string;
  port: number;
  timeoutMs: number;
}

export class EscPosNetworkPrinter implements ReceiptPrinter {
  private config: NetworkPrinterConfig;

  constructor(config: NetworkPrinterConfig) {
    this.config = config;
  }

  async print(receipt: Receipt): Promise<boolean> {
    const data = buildReceiptBuffer(receipt);
    try {
      await this.sendToPrinter(data);
      logger.info('Receipt sent to printer', {
        paymentNumber: receipt.paymentNumber,
        host: this.config.host,
        bytes: data.length,
      });
      return true;
    } catch (e) {
      logger.warn('Printer unreachable', {
        host: this.config.host,
        port: this.config.port,
        error: e instanceof Error ? e.message : String(e),
      });
      return false;
    }
  }

  private sendToPrinter(data: Buffer): Promise<void> {
    const { host, port, timeoutMs } = this.config;
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      let connected = false;

      const timeout = setTimeout(() => {
        if (!connected) {
          socket.destroy();
          reject(new Error(`Connection timeout to ${host}:${port}`));
        }
      }, timeoutMs);

      socket.connect(port, host, () => {
        connected = true;
        clearTimeout(timeout);

        socket.write(data, (err) => {
          if (err) {
            socket.destroy();
            reject(new Error(`Write error: ${err.message}`));
          } else {
            socket.end(() => resolve());
          }
        });
      });

      socket.on('error', (err) => {
        clearTimeout(timeout);
        reject(new Error(`Socket error: ${err.message}`));
      });
    });
  }
}

/** Lays out a receipt as printable text lines, before any ESC/POS encoding. */
export function formatReceiptLines(receipt: Receipt): string[] {
  const money = (amount: number) => formatMoney(amount, receipt.currency);
  const lines: string[] = [];

  for (const item of receipt.items) {
    lines.push(`${item.quantity}x ${item.name}`);
    lines.push(padLeft(money(item.subtotal)));
  }
  lines.push('-'.repeat(LINE_WIDTH));
  lines.push(columns('Subtotal', money(receipt.subtotal)));
  lines.push(columns('Tax', money(receipt.tax)));
  lines.push(columns('TOTAL', money(receipt.total)));
  lines.push(columns(`Paid (${receipt.method})`, money(receipt.amount)));
  if (receipt.transactionReference) {
    lines.push(columns('Ref', receipt.transactionReference));
  }
  lines.push(columns('Balance', money(receipt.balance)));
  return lines;
}

export function buildReceiptBuffer(receipt: Receipt): Buffer {
  const out: number[] = [];

  out.push(ESC, 0x40); // initialize
  align(out, Align.CENTER);
  text(out, receipt.business.name, { bold: true, doubleWidth: true });
  newLine(out);
  if (receipt.business.address) {
    text(out, receipt.business.address);
    newLine(out);
  }
  if (receipt.business.taxId) {
    text(out, `Tax ID: ${receipt.business.taxId}`);
    newLine(out);
  }
  text(out, receipt.processedAt.slice(0, 19).replace('T', ' '));
  newLine(out);
  text(out, '-'.repeat(LINE_WIDTH));
  newLine(out);

  align(out, Align.LEFT);
  text(out, `Order: ${receipt.orderNumber}`);
  newLine(out);
  text(out, `Receipt: ${receipt.paymentNumber}`);
  newLine(out);
  if (receipt.tableNumber) {
    text(out, `Table: ${receipt.tableNumber}`);
    newLine(out);
  }
  if (receipt.waiterName) {
    text(out, `Server: ${receipt.waiterName}`);
    newLine(out);
  }
  if (receipt.cashierName) {
    text(out, `Cashier: ${receipt.cashierName}`);
    newLine(out);
  }
  text(out, '-'.repeat(LINE_WIDTH));
  newLine(out);

  for (const line of formatReceiptLines(receipt)) {
    text(out, line, { bold: line.startsWith('TOTAL') });
    newLine(out);
  }

  align(out, Align.CENTER);
  newLine(out);
  text(out, 'Thank you!');
  newLine(out);
  newLine(out);

  out.push(GS, 0x56, 0x00); // full cut
  return Buffer.from(out);
}

function align(out: number[], value: Align): void {
  out.push(ESC, 0x61, value);
}

function text(out: number[], value: string, options?: { bold?: boolean; doubleWidth?: boolean }): void {
  if (options?.bold) {
    out.push(ESC, 0x45, 0x01);
  }
  if (options?.doubleWidth) {
    out.push(GS, 0x21, 0x10);
  }

  // Printers run a single-byte code page; anything outside it prints as '?'.
  for (const char of value) {
    const code = char.charCodeAt(0);
    out.push(code < 0x100 ? code : 0x3f);
  }

  if (options?.bold) {
    out.push(ESC, 0x45, 0x00);
  }
  if (options?.doubleWidth) {
    out.push(GS, 0x21, 0x00);
  }
}

function newLine(out: number[]): void {
  out.push(LF);
}

function padLeft(value: string): string {
  return value.padStart(LINE_WIDTH);
}

function columns(label: string, value: string): string {
  const gap = Math.max(LINE_WIDTH - label.length - value.length, 1);
  return `${label}${' '.repeat(gap)}${value}`;
}
