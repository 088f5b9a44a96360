import { RSI_PERIOD, computeWilderRsi, latestWilderRsi } from '../utils/indicators';

const rising = (count: number): number[] => Array.from({ length: count }, (_, i) => 1 + i * 0.01);
const falling = (count: number): number[] => Array.from({ length: count }, (_, i) => 10 - i * 0.1);
const alternating = (count: number): number[] => Array.from({ length: count }, (_, i) => (i % 2 === 0 ? 100 : 101));

describe('Wilder RSI', () => {
  it('needs one more close than the period', () => {
    expect(computeWilderRsi(rising(RSI_PERIOD))).toEqual([]);
    expect(latestWilderRsi(rising(RSI_PERIOD))).toBeNull();
    expect(computeWilderRsi(rising(RSI_PERIOD + 1))).toHaveLength(1);
  });

  it('is exactly 100 when there are no losses', () => {
    expect(latestWilderRsi(rising(15))).toBe(100);
    expect(latestWilderRsi(rising(40))).toBe(100);
  });

  it('is exactly 0 when there are only losses', () => {
    expect(latestWilderRsi(falling(15))).toBe(0);
    expect(latestWilderRsi(falling(30))).toBe(0);
  });

  it('treats a flat series as having no losses', () => {
    expect(latestWilderRsi(Array.from({ length: 20 }, () => 5))).toBe(100);
  });

  it('seeds with the simple average of the first period', () => {
    expect(latestWilderRsi(alternating(15))).toBe(50);
  });

  it('applies Wilder smoothing after the seed', () => {
    const closes = [...alternating(15), 102];
    // avgGain = (0.5 * 13 + 2) / 14, avgLoss = 0.5 * 13 / 14
    expect(latestWilderRsi(closes)).toBe(56.67);
    expect(computeWilderRsi(closes)).toHaveLength(2);
  });
});
