import { Fill, Order } from '../types';

/**
 * Order execution collaborator.
 *
 * Calls are synchronous and assumed accepted; their outcome comes back later
 * as fills. Orders carrying `linkedOrderId` form a one-cancels-other pair that
 * the implementation must enforce.
 */
export interface ExecutionService {
  insertOrder(order: Order): void;

  /** Replace price / label of a working order with the same id */
  modifyOrder(order: Order): void;

  cancelOrder(orderId: string): void;
}

export type FillListener = (fill: Fill) => void;
