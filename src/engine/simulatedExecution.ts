import { ExecutionService, FillListener } from './IExecutionService';
import { Bar, Fill, Order } from '../types';
import { applySlippage } from '../utils/priceUtils';
import { logDebug } from '../utils/logger';

export interface SimulatedExecutionOptions {
  slippageTicks?: number;
  instanceId?: string;
}

/**
 * Backtest execution venue.
 *
 * - MARKET orders queue up and fill in settlePending() at the bar close, slipped against the order
 * - STOP / LIMIT orders rest until processBar() sees a later bar trade through their price
 * - Orders with linkedOrderId are one-cancels-other: a fill cancels the linked order
 */
export class SimulatedExecution implements ExecutionService {
  private working = new Map<string, Order>();
  private pendingMarket: Order[] = [];
  private listeners: FillListener[] = [];
  private readonly slippageTicks: number;
  private readonly instanceId?: string;

  constructor(options: SimulatedExecutionOptions = {}) {
    this.slippageTicks = options.slippageTicks ?? 0;
    this.instanceId = options.instanceId;
  }

  onFill(listener: FillListener): void {
    this.listeners.push(listener);
  }

  insertOrder(order: Order): void {
    if (order.type === 'MARKET') {
      this.pendingMarket.push(order);
      return;
    }
    if (order.price === undefined) {
      throw new Error(`${order.type} order ${order.id} has no price`);
    }
    if (this.working.has(order.id)) {
      throw new Error(`Order ${order.id} is already working`);
    }
    this.working.set(order.id, order);
  }

  modifyOrder(order: Order): void {
    if (!this.working.has(order.id)) {
      throw new Error(`Cannot modify unknown order ${order.id}`);
    }
    this.working.set(order.id, order);
  }

  cancelOrder(orderId: string): void {
    if (this.working.delete(orderId)) {
      return;
    }
    const index = this.pendingMarket.findIndex((o) => o.id === orderId);
    if (index === -1) {
      throw new Error(`Cannot cancel unknown order ${orderId}`);
    }
    this.pendingMarket.splice(index, 1);
  }

  getWorkingOrders(): Order[] {
    return Array.from(this.working.values());
  }

  /**
   * Fill queued market orders at the close of `bar`
   */
  settlePending(bar: Bar): void {
    const orders = this.pendingMarket;
    this.pendingMarket = [];
    for (const order of orders) {
      const price = applySlippage(bar.close, this.slippageTicks, bar.tickSize, order.side);
      this.fill(order, price, bar.time);
    }
  }

  /**
   * Match resting stop/limit orders against a new bar.
   * Stops are matched before limits, so a bar that touches both legs of a pair exits at the stop.
   */
  processBar(bar: Bar): void {
    const resting = Array.from(this.working.values());
    const ordered = [
      ...resting.filter((o) => o.type === 'STOP'),
      ...resting.filter((o) => o.type === 'LIMIT'),
    ];

    for (const order of ordered) {
      // May have been cancelled by an OCO fill earlier in this pass
      if (!this.working.has(order.id)) {
        continue;
      }
      const price = triggerPrice(order, bar);
      if (price === undefined) {
        continue;
      }
      this.working.delete(order.id);
      if (order.linkedOrderId !== undefined && this.working.delete(order.linkedOrderId)) {
        logDebug('OCO cancel', { filled: order.id, cancelled: order.linkedOrderId }, this.instanceId);
      }
      this.fill(order, price, bar.time);
    }
  }

  private fill(order: Order, price: number, time: number): void {
    const fill: Fill = {
      orderId: order.id,
      side: order.side,
      price,
      quantity: order.quantity,
      time,
    };
    logDebug('Order filled', { order: order.id, label: order.label, price }, this.instanceId);
    for (const listener of this.listeners) {
      listener(fill);
    }
  }
}

/**
 * Price at which a resting order fills on `bar`, or undefined if it does not trigger.
 * A bar that opens beyond the order price fills at the open.
 */
export function triggerPrice(order: Order, bar: Bar): number | undefined {
  const price = order.price;
  if (price === undefined || order.type === 'MARKET') {
    return undefined;
  }

  if (order.type === 'STOP') {
    if (order.side === 'SELL') {
      if (bar.open <= price) return bar.open;
      return bar.low <= price ? price : undefined;
    }
    if (bar.open >= price) return bar.open;
    return bar.high >= price ? price : undefined;
  }

  if (order.side === 'SELL') {
    if (bar.open >= price) return bar.open;
    return bar.high >= price ? price : undefined;
  }
  if (bar.open <= price) return bar.open;
  return bar.low <= price ? price : undefined;
}
