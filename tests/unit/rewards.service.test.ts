import { describe, it, expect } from 'vitest';
import { monthKeys } from '../../src/modules/rewards/rewards.service';

describe('monthKeys', () => {
  it('covers the current month and the eleven before it, oldest first', () => {
    const keys = monthKeys(new Date('2026-03-15T12:00:00.000Z'));

    expect(keys).toHaveLength(12);
    expect(keys[0]).toBe('2025-04');
    expect(keys[11]).toBe('2026-03');
    expect(keys).toContain('2026-01');
  });

  it('uses UTC month boundaries', () => {
    expect(monthKeys(new Date('2026-01-01T00:30:00.000Z'), 2)).toEqual(['2025-12', '2026-01']);
  });
});
