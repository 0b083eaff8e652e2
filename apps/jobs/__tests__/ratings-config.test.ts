/**
 * Ratings Configuration Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { clearRatingsConfigCache, loadRatingsConfig, parseRatingsConfig } from '../src/config/ratings-config';

describe('Ratings Config', () => {
  describe('parseRatingsConfig', () => {
    test('empty content falls back to defaults', () => {
      expect(parseRatingsConfig('')).toEqual({
        lambda: {
          strategy: 'fixed_band',
          override: null,
          autoTune: { targetCondition: 1e7, maxLambda: 10, maxIterations: 10 },
        },
        solver: { pivotEpsilon: 1e-14 },
      });
    });

    test('reads every field', () => {
      const config = parseRatingsConfig(
        [
          'lambda:',
          '  strategy: auto_tuned',
          '  override: 0',
          '  auto_tune:',
          '    target_condition: 1000',
          '    max_lambda: 2.5',
          'solver:',
          '  pivot_epsilon: 0.000001',
        ].join('\n')
      );

      expect(config.lambda.strategy).toBe('auto_tuned');
      expect(config.lambda.override).toBe(0);
      expect(config.lambda.autoTune).toEqual({ targetCondition: 1000, maxLambda: 2.5, maxIterations: 10 });
      expect(config.solver.pivotEpsilon).toBe(1e-6);
    });

    test('rejects an unknown strategy', () => {
      expect(() => parseRatingsConfig('lambda:\n  strategy: ridge\n')).toThrow(
        'ratings config: unknown lambda strategy "ridge"'
      );
    });

    test('rejects a negative override', () => {
      expect(() => parseRatingsConfig('lambda:\n  override: -1\n')).toThrow(
        'ratings config: lambda.override must be null or a non-negative number, got -1'
      );
    });

    test('rejects a non-positive max_lambda', () => {
      expect(() => parseRatingsConfig('lambda:\n  auto_tune:\n    max_lambda: 0\n')).toThrow(
        'ratings config: lambda.auto_tune.max_lambda must be a positive number, got 0'
      );
    });

    test('rejects a fractional max_iterations', () => {
      expect(() => parseRatingsConfig('lambda:\n  auto_tune:\n    max_iterations: 2.5\n')).toThrow(
        'ratings config: lambda.auto_tune.max_iterations must be an integer, got 2.5'
      );
    });
  });

  describe('loadRatingsConfig', () => {
    const savedPath = process.env.RATINGS_CONFIG_PATH;
    let dir: string;

    beforeEach(() => {
      delete process.env.RATINGS_CONFIG_PATH;
      clearRatingsConfigCache();
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ratings-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
      clearRatingsConfigCache();
      if (savedPath === undefined) {
        delete process.env.RATINGS_CONFIG_PATH;
      } else {
        process.env.RATINGS_CONFIG_PATH = savedPath;
      }
    });

    test('bundled ratings.yml matches the defaults', () => {
      expect(loadRatingsConfig()).toEqual(parseRatingsConfig(''));
    });

    test('caches until cleared', () => {
      const first = loadRatingsConfig();
      expect(loadRatingsConfig()).toBe(first);

      const configPath = path.join(dir, 'ratings.yml');
      fs.writeFileSync(configPath, 'lambda:\n  strategy: continuous\n');
      process.env.RATINGS_CONFIG_PATH = configPath;

      expect(loadRatingsConfig().lambda.strategy).toBe('fixed_band');
      clearRatingsConfigCache();
      expect(loadRatingsConfig().lambda.strategy).toBe('continuous');
    });
  });
});
