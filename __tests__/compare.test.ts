import 'natural';
import { compareCodeUnits, compareNumbers } from '../utils/compare';

describe('compare', () => {
  it('should treat equal numbers as equal with natural loaded', () => {
    expect(compareNumbers(0, 0)).toBe(0);
    expect(compareNumbers(2, 2)).toBe(0);
    expect(compareNumbers(1, 2)).toBe(-1);
    expect(compareNumbers(-0.5, -1)).toBe(1);
  });

  it('should order strings by code unit', () => {
    expect(['b', 'élan', 'B', 'a'].sort(compareCodeUnits)).toEqual(['B', 'a', 'b', 'élan']);
    expect(compareCodeUnits('same', 'same')).toBe(0);
  });
});
