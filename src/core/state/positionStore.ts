import { ExitReason, Order, Position, PositionState, TrailingState } from '../../types';
import { StateInvariantError } from '../errors';

/**
 * Position state machine
 *
 * FLAT --OPEN_POSITION--> OPEN --CLOSE_POSITION--> FLAT
 *
 * UPDATE_STOP / UPDATE_TRAILING only apply while OPEN. Positions are replaced,
 * never mutated, so a snapshot is just the current reference.
 */

export type PositionAction =
  | { type: 'OPEN_POSITION'; payload: Position }
  | { type: 'UPDATE_STOP'; payload: { price: number; label: string } }
  | { type: 'UPDATE_TRAILING'; payload: TrailingState }
  | { type: 'CLOSE_POSITION'; reason: ExitReason };

export interface PositionSnapshot {
  readonly position: Position | null;
}

export class PositionStore {
  private position: Position | null = null;

  get(): Position | null {
    return this.position;
  }

  getState(): PositionState {
    return this.position ? 'OPEN' : 'FLAT';
  }

  dispatch(action: PositionAction): void {
    switch (action.type) {
      case 'OPEN_POSITION': {
        if (this.position) {
          throw new StateInvariantError('Position already exists or state is not FLAT');
        }
        this.position = action.payload;
        return;
      }

      case 'UPDATE_STOP': {
        const current = this.requireOpen(action.type);
        const stopOrder: Order = {
          ...current.stopOrder,
          price: action.payload.price,
          label: action.payload.label,
        };
        this.position = { ...current, stopOrder };
        return;
      }

      case 'UPDATE_TRAILING': {
        const current = this.requireOpen(action.type);
        this.position = { ...current, trailing: { ...action.payload } };
        return;
      }

      case 'CLOSE_POSITION': {
        this.requireOpen(action.type);
        this.position = null;
        return;
      }
    }
  }

  snapshot(): PositionSnapshot {
    return { position: this.position };
  }

  restore(snapshot: PositionSnapshot): void {
    this.position = snapshot.position;
  }

  private requireOpen(actionType: PositionAction['type']): Position {
    if (!this.position) {
      throw new StateInvariantError(`${actionType} requires an open position`);
    }
    return this.position;
  }
}
