/**
 * Unit tests for StrategyInstanceRunner (per-bar decision flow)
 */

import { StrategyInstance } from '../strategyInstance';
import { StrategyInstanceRunner } from '../strategyInstanceRunner';
import { defaultConfig } from '../../config/config';
import { loadConfig } from '../../config/configSchema';
import { ConfigurationError, StateInvariantError } from '../../core/errors';
import { logger } from '../../utils/logger';
import {
  HALF_HOUR,
  MONDAY_18,
  RecordingExecution,
  StubMarketView,
  closeView,
  longSetupView,
  makeBar,
} from '../../__tests__/helpers/fixtures';

describe('StrategyInstanceRunner', () => {
  let execution: RecordingExecution;
  let instance: StrategyInstance;
  let runner: StrategyInstanceRunner;

  beforeAll(() => {
    logger.setSilent(true);
  });

  afterAll(() => {
    logger.setSilent(false);
  });

  function setup(config = defaultConfig): void {
    execution = new RecordingExecution();
    instance = new StrategyInstance({ instanceId: 'TEST', config }, execution);
    runner = new StrategyInstanceRunner(instance);
  }

  beforeEach(() => {
    setup();
  });

  it('should reject an invalid config at construction', () => {
    expect(
      () =>
        new StrategyInstance(
          { instanceId: 'BAD', config: { ...defaultConfig, signal: { buyLevel: 40, sellLevel: 60 } } },
          new RecordingExecution()
        )
    ).toThrow(ConfigurationError);
  });

  describe('while FLAT', () => {
    it('should enter long on a %D cross from 50 to 52', () => {
      runner.onBar(longSetupView({ close: 1.1, stochD: [52, 50] }));

      expect(execution.calls.map((c) => (c.op === 'cancel' ? c.orderId : `${c.op}:${c.order.type}`))).toEqual([
        'insert:MARKET',
        'insert:STOP',
        'insert:LIMIT',
      ]);
      const position = instance.getPositionManager().getPosition();
      expect(position?.side).toBe('LONG');
      expect(position?.stopOrder.price).toBe(1.0976);
      expect(position?.targetOrder.price).toBe(1.1077);
      expect(position?.stopOrder.linkedOrderId).toBe(position?.targetOrder.id);
      expect(position?.targetOrder.linkedOrderId).toBe(position?.stopOrder.id);
    });

    it('should send no orders without a crossing', () => {
      runner.onBar(longSetupView({ stochD: [53, 52] }));
      runner.onBar(longSetupView({ stochD: [50, 49] }));

      expect(execution.calls).toEqual([]);
      expect(instance.getPositionManager().getState()).toBe('FLAT');
    });

    it('should do nothing without a current bar', () => {
      runner.onBar(new StubMarketView({ bars: [] }));
      expect(execution.calls).toEqual([]);
    });
  });

  describe('while OPEN', () => {
    beforeEach(() => {
      runner.onBar(longSetupView({ close: 1.1 }));
      execution.calls = [];
    });

    it('should not evaluate entries', () => {
      runner.onBar(longSetupView({ close: 1.1, stochD: [52, 50] }));
      expect(execution.calls).toEqual([]);
    });

    it('should trail the stop on a new favorable close', () => {
      runner.onBar(closeView(1.102));

      expect(execution.calls).toHaveLength(1);
      const [call] = execution.calls;
      expect(call.op).toBe('modify');
      if (call.op === 'modify') {
        expect(call.order.id).toBe('ORD-2');
        expect(call.order.price).toBe(1.09848);
        expect(call.order.label).toBe('Trailing stop long exit');
      }
      const trailing = instance.getPositionManager().getPosition()?.trailing;
      expect(trailing?.furthestClose).toBe(1.102);
      expect(trailing?.acceleration).toBeCloseTo(0.00088, 12);
    });

    it('should hold the stop when the close does not improve', () => {
      runner.onBar(closeView(1.099));
      expect(execution.calls).toEqual([]);
    });

    it('should react to a protective fill by going FLAT without new requests', () => {
      runner.onFill({ orderId: 'ORD-3', side: 'SELL', price: 1.1077, quantity: 1, time: MONDAY_18 + HALF_HOUR });

      expect(instance.getPositionManager().getState()).toBe('FLAT');
      expect(execution.calls).toEqual([]);
    });

    it('should flatten at session end', () => {
      runner.onSessionEnd(makeBar(MONDAY_18 + HALF_HOUR, 1.1));

      expect(execution.calls).toEqual([
        { op: 'cancel', orderId: 'ORD-2' },
        { op: 'cancel', orderId: 'ORD-3' },
        {
          op: 'insert',
          order: { id: 'ORD-4', side: 'SELL', type: 'MARKET', quantity: 1, label: 'Exit long position' },
        },
      ]);
      expect(instance.getPositionManager().getState()).toBe('FLAT');
    });
  });

  it('should flatten when the trailing stop would cross the close', () => {
    setup(loadConfig({ risk: { stopAcceleration: 2 } }));
    runner.onBar(longSetupView({ close: 1.1 }));
    execution.calls = [];

    runner.onBar(closeView(1.102));

    expect(execution.calls.map((c) => c.op)).toEqual(['cancel', 'cancel', 'insert']);
    expect(instance.getPositionManager().getState()).toBe('FLAT');
  });

  it('should treat session end as a no-op while FLAT', () => {
    runner.onSessionEnd(makeBar(MONDAY_18, 1.1));
    expect(execution.calls).toEqual([]);
  });

  it('should reset acceleration on every new trade', () => {
    runner.onBar(longSetupView({ close: 1.1 }));
    runner.onBar(closeView(1.102));
    runner.onSessionEnd(makeBar(MONDAY_18 + HALF_HOUR, 1.102));

    runner.onBar(longSetupView({ close: 1.1, time: MONDAY_18 + 2 * HALF_HOUR }));

    const position = instance.getPositionManager().getPosition();
    expect(position?.trailing).toEqual({ acceleration: 0.2, furthestClose: 1.1 });
    expect(position?.stopOrder.id).toBe('ORD-6');
  });

  describe('atomic bars', () => {
    it('should roll back an entry the venue rejects', () => {
      execution.failOn = 'insert';

      expect(() => runner.onBar(longSetupView())).toThrow('venue rejected insert');
      expect(instance.getPositionManager().getState()).toBe('FLAT');
    });

    it('should leave nothing at the venue when the protective stop is rejected', () => {
      execution.rejectInsert = (order) => order.type === 'STOP';

      expect(() => runner.onBar(longSetupView())).toThrow('venue rejected order ORD-2');
      expect(instance.getPositionManager().getState()).toBe('FLAT');
      expect(execution.calls.slice(1)).toEqual([{ op: 'cancel', orderId: 'ORD-1' }]);
    });

    it('should roll back trailing state when the stop modification fails', () => {
      runner.onBar(longSetupView({ close: 1.1 }));
      execution.failOn = 'modify';

      expect(() => runner.onBar(closeView(1.102))).toThrow('venue rejected modify');
      expect(instance.getPositionManager().getPosition()?.trailing).toEqual({ acceleration: 0.2, furthestClose: 1.1 });
      expect(instance.getPositionManager().getPosition()?.stopOrder.price).toBe(1.0976);
    });

    it('should surface invariant violations from the position manager', () => {
      expect(() => instance.getPositionManager().exit('MANUAL_EXIT')).toThrow(StateInvariantError);
    });
  });
});
