import {
  ExponentialBackoff,
  LinearBackoff,
  createBackoffPolicy,
  jitterInterval
} from '../../../src/backoff/BackoffPolicy';
import { ConfigurationError } from '../../../src/common/errors';

describe('BackoffPolicy', () => {
  describe('LinearBackoff', () => {
    test('should return base * attempt', () => {
      const policy = new LinearBackoff({ baseDelayMs: 1000 });

      expect(policy.delayFor(1)).toBe(1000);
      expect(policy.delayFor(2)).toBe(2000);
      expect(policy.delayFor(3)).toBe(3000);
    });

    test('should cap at maxDelayMs', () => {
      const policy = new LinearBackoff({ baseDelayMs: 1000, maxDelayMs: 2500 });

      expect(policy.delayFor(5)).toBe(2500);
    });

    test('should treat attempts below 1 as the first attempt', () => {
      const policy = new LinearBackoff({ baseDelayMs: 100 });

      expect(policy.delayFor(0)).toBe(100);
      expect(policy.delayFor(-3)).toBe(100);
    });
  });

  describe('ExponentialBackoff', () => {
    test('should double per attempt starting at base', () => {
      const policy = new ExponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 30000 });

      expect(policy.delayFor(1)).toBe(1000);
      expect(policy.delayFor(2)).toBe(2000);
      expect(policy.delayFor(3)).toBe(4000);
    });

    test('should cap at the configured maximum', () => {
      const policy = new ExponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 5000 });

      expect(policy.delayFor(3)).toBe(4000);
      expect(policy.delayFor(4)).toBe(5000);
      expect(policy.delayFor(20)).toBe(5000);
    });
  });

  describe('jitter', () => {
    test('should stay at the raw delay when disabled', () => {
      const random = jest.fn(() => 0.99);
      const policy = new LinearBackoff({ baseDelayMs: 1000, random });

      expect(policy.delayFor(2)).toBe(2000);
      expect(random).not.toHaveBeenCalled();
    });

    test('should spread ±20% around the delay using the injected random source', () => {
      const low = new LinearBackoff({ baseDelayMs: 1000, jitter: true, random: () => 0 });
      const mid = new LinearBackoff({ baseDelayMs: 1000, jitter: true, random: () => 0.5 });
      const high = new LinearBackoff({ baseDelayMs: 1000, jitter: true, random: () => 0.75 });

      expect(low.delayFor(1)).toBe(800);
      expect(mid.delayFor(1)).toBe(1000);
      expect(high.delayFor(1)).toBe(1100);
    });

    test('should jitter after capping', () => {
      const policy = new ExponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 2000, jitter: true, random: () => 0 });

      expect(policy.delayFor(5)).toBe(1600);
    });

    test('should jitter fixed intervals', () => {
      expect(jitterInterval(5000, 0.2, () => 0)).toBe(4000);
      expect(jitterInterval(5000, 0.2, () => 0.5)).toBe(5000);
    });
  });

  test('should be a pure function of the attempt', () => {
    const policy = createBackoffPolicy('exponential', { baseDelayMs: 250 });

    expect(policy.delayFor(3)).toBe(policy.delayFor(3));
    expect(policy.strategy).toBe('exponential');
  });

  test('should build the linear strategy by name', () => {
    const policy = createBackoffPolicy('linear', { baseDelayMs: 10 });

    expect(policy).toBeInstanceOf(LinearBackoff);
    expect(policy.delayFor(4)).toBe(40);
  });

  test('should reject a negative base delay', () => {
    expect(() => new LinearBackoff({ baseDelayMs: -1 })).toThrow(ConfigurationError);
  });
});
