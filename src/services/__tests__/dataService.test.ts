import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { prepareBacktestData, resolveBacktestWindow } from '../dataService';
import { DataFetcher } from '../../data/fetcher';
import { defaultConfig } from '../../config/config';
import { Bar } from '../../types';

const HALF_HOUR = 1_800_000;

function bars(count: number): Bar[] {
  const result: Bar[] = [];
  for (let i = 1; i <= count; i++) {
    result.push({ time: i * HALF_HOUR, open: 1.1, high: 1.2, low: 1.0, close: 1.1, volume: 0, tickSize: 0.0001 });
  }
  return result;
}

describe('dataService', () => {
  describe('resolveBacktestWindow', () => {
    it('should parse the configured window as UTC dates', () => {
      expect(resolveBacktestWindow(defaultConfig)).toEqual({
        interval: '30m',
        startTime: Date.UTC(2025, 0, 1),
        endTime: Date.UTC(2025, 6, 1),
      });
    });

    it('should require a backtest section', () => {
      const { backtest, ...withoutBacktest } = defaultConfig;
      expect(backtest).toBeDefined();
      expect(() => resolveBacktestWindow(withoutBacktest)).toThrow(
        'backtest config is required to fetch bars from the exchange'
      );
    });
  });

  describe('prepareBacktestData', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stoch-data-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
      jest.restoreAllMocks();
    });

    it('should sort file bars and build aligned indicators', async () => {
      const file = path.join(dir, 'bars.json');
      const rows = bars(3).reverse().map(({ tickSize, ...row }) => row);
      fs.writeFileSync(file, JSON.stringify(rows));

      const data = await prepareBacktestData(defaultConfig, { kind: 'file', path: file });

      expect(data.bars.map((b) => b.time)).toEqual([HALF_HOUR, 2 * HALF_HOUR, 3 * HALF_HOUR]);
      expect(data.indicators).toHaveLength(3);
      expect(data.validation.isValid).toBe(true);
    });

    it('should skip indicators when validation fails', async () => {
      const file = path.join(dir, 'bars.json');
      fs.writeFileSync(file, JSON.stringify([]));

      const data = await prepareBacktestData(defaultConfig, { kind: 'file', path: file });

      expect(data.validation.errors).toEqual(['No bar data provided']);
      expect(data.indicators).toEqual([]);
    });

    it('should fetch the configured window from the exchange', async () => {
      const fetcher = new DataFetcher(0.0001, 'http://exchange.test');
      const fetchBars = jest.spyOn(fetcher, 'fetchBarsForBacktest').mockResolvedValueOnce(bars(2));

      const data = await prepareBacktestData(defaultConfig, { kind: 'exchange', fetcher });

      expect(fetchBars).toHaveBeenCalledWith('EURUSDT', '30m', Date.UTC(2025, 0, 1), Date.UTC(2025, 6, 1));
      expect(data.bars).toHaveLength(2);
    });
  });
});
