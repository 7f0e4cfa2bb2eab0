import { describe, it, expect } from 'vitest';
import { backoffDelay } from './backoff.js';

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect(backoffDelay(1, 500, 30_000)).toBe(500);
    expect(backoffDelay(2, 500, 30_000)).toBe(1000);
    expect(backoffDelay(3, 500, 30_000)).toBe(2000);
  });

  it('caps at the maximum', () => {
    expect(backoffDelay(7, 500, 30_000)).toBe(30_000);
    expect(backoffDelay(10_000, 500, 30_000)).toBe(30_000);
  });
});
