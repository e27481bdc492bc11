import {
  EntryReason,
  ExitReason,
  Fill,
  Order,
  OrderSide,
  Position,
  PositionSide,
  PositionState,
  TrailingState,
} from '../../types';
import { ExecutionService } from '../../engine/IExecutionService';
import { StateInvariantError } from '../errors';
import { PositionSnapshot, PositionStore } from './positionStore';
import { normalizePrice, ticksToPrice } from '../../utils/priceUtils';
import { logDebug, logError, logInfo } from '../../utils/logger';

/**
 * Position & Order Lifecycle Manager
 *
 * Responsibilities:
 * - Own the single position slot (FLAT / LONG 1 / SHORT 1) through PositionStore
 * - Place entry + linked stop/target, in that order, on enter(); if the venue
 *   rejects one of them, cancel the ones already sent
 * - Cancel the pair before flattening on exit()
 * - Move the stop in place on modifyStop(), leaving the target alone
 * - Translate fills into trade events for the trade log
 *
 * Every request goes to the ExecutionService; invalid-state calls throw
 * StateInvariantError instead of coercing state.
 */

export interface EntryParams {
  side: PositionSide;
  close: number;
  tickSize: number;
  stopTicks: number;
  profitTicks: number;
  baseAcceleration: number;
  time: number;
  reason?: EntryReason;
}

export type TradeEvent =
  | { kind: 'ENTRY_FILLED'; side: PositionSide; fill: Fill }
  | { kind: 'EXIT_FILLED'; side: PositionSide; fill: Fill; reason: ExitReason };

export type TradeEventListener = (event: TradeEvent) => void;

interface PendingExit {
  orderId: string;
  side: PositionSide;
  reason: ExitReason;
}

interface PendingEntry {
  orderId: string;
  side: PositionSide;
}

export interface ManagerSnapshot {
  readonly position: PositionSnapshot;
  readonly pendingEntry: PendingEntry | null;
  readonly pendingExits: PendingExit[];
}

const LABELS = {
  LONG: {
    entry: 'Enter long position',
    stop: 'Catastrophic stop long exit',
    target: 'Profit stop long exit',
    trailing: 'Trailing stop long exit',
    exit: 'Exit long position',
  },
  SHORT: {
    entry: 'Enter short position',
    stop: 'Catastrophic stop short exit',
    target: 'Profit stop short exit',
    trailing: 'Trailing stop short exit',
    exit: 'Exit short position',
  },
} as const;

export function trailingStopLabel(side: PositionSide): string {
  return LABELS[side].trailing;
}

function entrySide(side: PositionSide): OrderSide {
  return side === 'LONG' ? 'BUY' : 'SELL';
}

function closingSide(side: PositionSide): OrderSide {
  return side === 'LONG' ? 'SELL' : 'BUY';
}

export class PositionManager {
  private readonly execution: ExecutionService;
  private readonly store: PositionStore;
  private readonly instanceId?: string;
  private readonly orderIdPrefix: string;
  private orderSeq = 0;

  private pendingEntry: PendingEntry | null = null;
  private pendingExits: PendingExit[] = [];
  private listeners: TradeEventListener[] = [];

  constructor(
    execution: ExecutionService,
    options: { instanceId?: string; orderIdPrefix?: string; store?: PositionStore } = {}
  ) {
    this.execution = execution;
    this.instanceId = options.instanceId;
    this.orderIdPrefix = options.orderIdPrefix ?? 'ORD';
    this.store = options.store ?? new PositionStore();
  }

  getPosition(): Position | null {
    return this.store.get();
  }

  getState(): PositionState {
    return this.store.getState();
  }

  addTradeListener(listener: TradeEventListener): void {
    this.listeners.push(listener);
  }

  /**
   * Open a one-contract position with its protective OCO pair.
   * Requests go out as entry -> stop -> target.
   */
  enter(params: EntryParams): Position {
    if (this.store.getState() !== 'FLAT') {
      throw this.invariantError(`enter(${params.side}) requires a FLAT position`);
    }

    const { side, close, tickSize } = params;
    const stopOffset = ticksToPrice(params.stopTicks, tickSize);
    const profitOffset = ticksToPrice(params.profitTicks, tickSize);

    // Stop is always adverse, target always favorable
    const stopPrice = normalizePrice(side === 'LONG' ? close - stopOffset : close + stopOffset);
    const targetPrice = normalizePrice(side === 'LONG' ? close + profitOffset : close - profitOffset);

    const labels = LABELS[side];
    const entryOrder: Order = {
      id: this.nextOrderId(),
      side: entrySide(side),
      type: 'MARKET',
      quantity: 1,
      label: labels.entry,
    };
    const stopId = this.nextOrderId();
    const targetId = this.nextOrderId();
    const stopOrder: Order = {
      id: stopId,
      side: closingSide(side),
      type: 'STOP',
      quantity: 1,
      price: stopPrice,
      label: labels.stop,
      linkedOrderId: targetId,
    };
    const targetOrder: Order = {
      id: targetId,
      side: closingSide(side),
      type: 'LIMIT',
      quantity: 1,
      price: targetPrice,
      label: labels.target,
      linkedOrderId: stopId,
    };

    const position: Position = {
      side,
      entryPrice: close,
      entryTime: params.time,
      stopOrder,
      targetOrder,
      trailing: {
        acceleration: params.baseAcceleration,
        furthestClose: close,
      },
      reason: params.reason,
    };

    const before = this.store.snapshot();
    this.store.dispatch({ type: 'OPEN_POSITION', payload: position });
    this.pendingEntry = { orderId: entryOrder.id, side };

    const sent: Order[] = [];
    try {
      for (const order of [entryOrder, stopOrder, targetOrder]) {
        this.execution.insertOrder(order);
        sent.push(order);
      }
    } catch (error) {
      // A half-placed entry must not stay at the venue
      this.withdraw(sent);
      this.store.restore(before);
      this.pendingEntry = null;
      throw error;
    }

    logInfo('Entered position', {
      side,
      close,
      stop: stopPrice,
      target: targetPrice,
      orders: [entryOrder.id, stopOrder.id, targetOrder.id],
    }, this.instanceId);

    return position;
  }

  /**
   * Flatten the open position: cancel stop, cancel target, then send the closing market order
   */
  exit(reason: ExitReason): Order {
    const position = this.store.get();
    if (!position) {
      throw this.invariantError(`exit(${reason}) requires an open position`);
    }

    const exitOrder: Order = {
      id: this.nextOrderId(),
      side: closingSide(position.side),
      type: 'MARKET',
      quantity: 1,
      label: LABELS[position.side].exit,
    };

    this.store.dispatch({ type: 'CLOSE_POSITION', reason });
    this.pendingExits.push({ orderId: exitOrder.id, side: position.side, reason });

    this.execution.cancelOrder(position.stopOrder.id);
    this.execution.cancelOrder(position.targetOrder.id);
    this.execution.insertOrder(exitOrder);

    logInfo('Exited position', { side: position.side, reason, order: exitOrder.id }, this.instanceId);

    return exitOrder;
  }

  /**
   * Move the stop of the open position; the target is untouched
   */
  modifyStop(newPrice: number, newLabel: string): Order {
    const position = this.store.get();
    if (!position) {
      throw this.invariantError('modifyStop requires an open position');
    }

    const price = normalizePrice(newPrice);
    this.store.dispatch({ type: 'UPDATE_STOP', payload: { price, label: newLabel } });

    const updated = { ...position.stopOrder, price, label: newLabel };
    this.execution.modifyOrder(updated);

    logDebug('Stop modified', { order: updated.id, from: position.stopOrder.price, to: price }, this.instanceId);

    return updated;
  }

  updateTrailing(state: TrailingState): void {
    if (!this.store.get()) {
      throw this.invariantError('updateTrailing requires an open position');
    }
    this.store.dispatch({ type: 'UPDATE_TRAILING', payload: state });
  }

  /**
   * React to a fill reported by the execution service.
   * A fill on the stop or target closes the position; the venue has already
   * cancelled the other leg, so no further requests are sent.
   */
  onFill(fill: Fill): void {
    if (this.pendingEntry && fill.orderId === this.pendingEntry.orderId) {
      const { side } = this.pendingEntry;
      this.pendingEntry = null;
      this.emit({ kind: 'ENTRY_FILLED', side, fill });
      return;
    }

    const exitIndex = this.pendingExits.findIndex((p) => p.orderId === fill.orderId);
    if (exitIndex !== -1) {
      const [pending] = this.pendingExits.splice(exitIndex, 1);
      this.emit({ kind: 'EXIT_FILLED', side: pending.side, fill, reason: pending.reason });
      return;
    }

    const position = this.store.get();
    if (!position) {
      logDebug('Ignoring fill with no open position', { order: fill.orderId }, this.instanceId);
      return;
    }

    let reason: ExitReason | undefined;
    if (fill.orderId === position.stopOrder.id) {
      reason = 'STOP_FILLED';
    } else if (fill.orderId === position.targetOrder.id) {
      reason = 'TARGET_FILLED';
    }

    if (!reason) {
      logDebug('Ignoring fill for an order not owned by the open position', { order: fill.orderId }, this.instanceId);
      return;
    }

    this.store.dispatch({ type: 'CLOSE_POSITION', reason });
    logInfo('Position closed by protective order', {
      side: position.side,
      reason,
      order: fill.orderId,
      price: fill.price,
    }, this.instanceId);
    this.emit({ kind: 'EXIT_FILLED', side: position.side, fill, reason });
  }

  /**
   * Capture everything a bar can change, for all-or-nothing bar processing
   */
  snapshot(): ManagerSnapshot {
    return {
      position: this.store.snapshot(),
      pendingEntry: this.pendingEntry,
      pendingExits: [...this.pendingExits],
    };
  }

  restore(snapshot: ManagerSnapshot): void {
    this.store.restore(snapshot.position);
    this.pendingEntry = snapshot.pendingEntry;
    this.pendingExits = [...snapshot.pendingExits];
  }

  /**
   * Cancel orders already sent, most recent first
   */
  private withdraw(orders: Order[]): void {
    for (const order of [...orders].reverse()) {
      try {
        this.execution.cancelOrder(order.id);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logError('Failed to withdraw order', { order: order.id, error: message }, this.instanceId);
      }
    }
  }

  private emit(event: TradeEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private nextOrderId(): string {
    this.orderSeq += 1;
    return `${this.orderIdPrefix}-${this.orderSeq}`;
  }

  private invariantError(message: string): StateInvariantError {
    logError(message, { state: this.store.getState() }, this.instanceId);
    return new StateInvariantError(message);
  }
}
