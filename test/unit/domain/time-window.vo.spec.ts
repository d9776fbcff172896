import { describe, it, expect } from 'vitest';
import { TimeWindowVO } from '../../../src/domain/value-objects/time-window.vo';

describe('TimeWindowVO', () => {
  const start = new Date('2025-11-14T16:00:00.000Z');
  const end = new Date('2025-11-14T20:00:00.000Z');
  const window = TimeWindowVO.create({ start, end, timezone: 'Asia/Shanghai' });

  it('should reject an empty or reversed window', () => {
    expect(() => TimeWindowVO.create({ start, end: start, timezone: 'UTC' })).toThrow(
      'Time window start must be before end',
    );
    expect(() => TimeWindowVO.create({ start: end, end: start, timezone: 'UTC' })).toThrow();
  });

  it('should reject invalid dates and a blank timezone', () => {
    expect(() =>
      TimeWindowVO.create({ start: new Date('nope'), end, timezone: 'UTC' }),
    ).toThrow('Time window boundaries must be valid dates');
    expect(() => TimeWindowVO.create({ start, end, timezone: ' ' })).toThrow(
      'Time window timezone is required',
    );
  });

  it('should expose epoch seconds and a stable key', () => {
    expect(window.startEpochSeconds).toBe(start.getTime() / 1000);
    expect(window.endEpochSeconds).toBe(end.getTime() / 1000);
    expect(window.key()).toBe(`${start.getTime() / 1000}-${end.getTime() / 1000}`);
  });

  it('should render in the wall clock of its timezone', () => {
    expect(window.label()).toBe('2025-11-15 00:00-04:00');
    expect(String(window)).toBe('2025-11-15 00:00-04:00');
  });

  it('should render a window spanning days with both dates', () => {
    const overnight = TimeWindowVO.create({
      start: new Date('2025-11-15T14:00:00.000Z'),
      end: new Date('2025-11-15T18:00:00.000Z'),
      timezone: 'Asia/Shanghai',
    });

    expect(overnight.label()).toBe('2025-11-15 22:00-2025-11-16 02:00');
  });

  it('should be half-open', () => {
    expect(window.contains(start)).toBe(true);
    expect(window.contains(new Date(end.getTime() - 1))).toBe(true);
    expect(window.contains(end)).toBe(false);
  });

  it('should not share its dates with callers', () => {
    window.start.setTime(0);
    expect(window.start.toISOString()).toBe('2025-11-14T16:00:00.000Z');
  });

  it('should compare by value', () => {
    const same = TimeWindowVO.create({ start, end, timezone: 'Asia/Shanghai' });
    const otherZone = TimeWindowVO.create({ start, end, timezone: 'UTC' });

    expect(window.equals(same)).toBe(true);
    expect(window.equals(otherZone)).toBe(false);
    expect(window.key()).toBe(otherZone.key());
  });

  it('should serialize to ISO instants', () => {
    expect(window.toJSON()).toEqual({
      start: '2025-11-14T16:00:00.000Z',
      end: '2025-11-14T20:00:00.000Z',
      timezone: 'Asia/Shanghai',
    });
  });
});
