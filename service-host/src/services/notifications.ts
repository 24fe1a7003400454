/**
 * Notification collaborator.
 *
 * The core emits events here after its transactions commit; delivery
 * (dashboard, email, SMS) belongs to whoever subscribes.
 */

import { EventEmitter } from 'events';
import { getLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

const logger = getLogger('Notifications');

export interface StockAlert {
  productId: string;
  productName: string;
  stockQuantity: number;
  minStockLevel: number;
  unitOfMeasure: string;
}

export interface PriceChangeNotice {
  productId: string;
  productName: string;
  oldPrice: number;
  newPrice: number;
  changedBy: string;
}

export interface CashVarianceNotice {
  shiftId: string;
  userId: string;
  expectedCash: number;
  closingCash: number;
  variance: number;
  threshold: number;
}

export interface NotificationEvents {
  low_stock: StockAlert;
  out_of_stock: StockAlert;
  price_change: PriceChangeNotice;
  cash_variance: CashVarianceNotice;
}

export type NotificationType = keyof NotificationEvents;

export class NotificationBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  /** A failing subscriber is logged; it never reaches the emitting operation. */
  on<K extends NotificationType>(type: K, listener: (payload: NotificationEvents[K]) => void): () => void {
    const guarded = (payload: NotificationEvents[K]): void => {
      try {
        listener(payload);
      } catch (error) {
        logger.error('Notification listener failed', toError(error), { type });
      }
    };
    this.emitter.on(type, guarded);
    return () => {
      this.emitter.off(type, guarded);
    };
  }

  emit<K extends NotificationType>(type: K, payload: NotificationEvents[K]): void {
    this.emitter.emit(type, payload);
  }
}
