import { describe, it, expect } from 'vitest';
import { dailyCronExpression, minutesApart, zonedClock } from './time.js';

describe('zonedClock', () => {
  it('reads the wall clock in the schedule timezone', () => {
    expect(zonedClock(new Date('2024-05-01T12:30:00.000Z'), 'Asia/Kolkata')).toEqual({ date: '2024-05-01', time: '18:00' });
  });

  it('rolls the date over at local midnight', () => {
    expect(zonedClock(new Date('2024-05-01T18:45:00.000Z'), 'Asia/Kolkata')).toEqual({ date: '2024-05-02', time: '00:15' });
  });
});

describe('dailyCronExpression', () => {
  it('maps HH:MM onto minute and hour fields', () => {
    expect(dailyCronExpression('18:00')).toBe('0 18 * * *');
    expect(dailyCronExpression('07:05')).toBe('5 7 * * *');
  });
});

describe('minutesApart', () => {
  it('takes the shorter way round the clock', () => {
    expect(minutesApart('18:00', '20:00')).toBe(120);
    expect(minutesApart('20:00', '18:00')).toBe(120);
    expect(minutesApart('23:30', '00:15')).toBe(45);
  });
});
