import { describe, it, expect } from 'vitest';
import {
  addDays,
  canCombineUnits,
  convertQuantity,
  dateRangeYMD,
  getAgeGroup,
  isSeasonal,
  isValidDateYMD,
  pageCount,
  roundTo,
  scaleNutrition,
  sumMacros,
  formatDateYMD,
  parseDateYMD,
} from './index';

describe('date helpers', () => {
  it('accepts real calendar dates only', () => {
    expect(isValidDateYMD('2024-02-29')).toBe(true);
    expect(isValidDateYMD('2023-02-29')).toBe(false);
    expect(isValidDateYMD('2024-13-01')).toBe(false);
    expect(isValidDateYMD('2024-1-01')).toBe(false);
    expect(isValidDateYMD('yesterday')).toBe(false);
  });

  it('adds days across month boundaries', () => {
    expect(formatDateYMD(addDays(parseDateYMD('2024-01-30'), 3))).toBe('2024-02-02');
    expect(formatDateYMD(addDays(parseDateYMD('2024-03-01'), -1))).toBe('2024-02-29');
  });

  it('lists an inclusive date range', () => {
    expect(dateRangeYMD('2024-12-30', '2025-01-02')).toEqual([
      '2024-12-30',
      '2024-12-31',
      '2025-01-01',
      '2025-01-02',
    ]);
    expect(dateRangeYMD('2024-05-02', '2024-05-01')).toEqual([]);
  });
});

describe('scaleNutrition', () => {
  it('scales per-100g values to the given weight', () => {
    const facts = { calories: 18, protein: 0.9, fat: 0.2, carbohydrate: 3.9, fiber: 1.2 };
    expect(scaleNutrition(facts, 250)).toEqual({
      calories: 45,
      protein: 2.25,
      fat: 0.5,
      carbohydrate: 9.75,
      fiber: 3,
    });
  });

  it('rounds to two decimals', () => {
    const facts = { calories: 33.33, protein: 0, fat: 0, carbohydrate: 0, fiber: 0 };
    expect(scaleNutrition(facts, 33).calories).toBe(11);
  });
});

describe('sumMacros', () => {
  it('returns zeros for no entries', () => {
    expect(sumMacros([])).toEqual({ calories: 0, protein: 0, fat: 0, carbohydrate: 0 });
  });

  it('adds each macro', () => {
    expect(
      sumMacros([
        { calories: 100, protein: 5, fat: 2, carbohydrate: 10 },
        { calories: 250, protein: 20, fat: 8, carbohydrate: 0 },
      ])
    ).toEqual({ calories: 350, protein: 25, fat: 10, carbohydrate: 10 });
  });
});

describe('getAgeGroup', () => {
  it.each([
    [null, 'unknown'],
    [0, 'unknown'],
    [12, 'teen'],
    [18, 'young_adult'],
    [34, 'young_adult'],
    [35, 'middle_aged'],
    [59, 'middle_aged'],
    [60, 'senior'],
  ] as const)('age %s is %s', (age, group) => {
    expect(getAgeGroup(age)).toBe(group);
  });
});

describe('units', () => {
  it('combines identical, weight and volume units', () => {
    expect(canCombineUnits('piece', 'piece')).toBe(true);
    expect(canCombineUnits('g', 'kg')).toBe(true);
    expect(canCombineUnits('ml', 'L')).toBe(true);
    expect(canCombineUnits('g', 'ml')).toBe(false);
    expect(canCombineUnits('piece', 'g')).toBe(false);
  });

  it('converts between combinable units', () => {
    expect(convertQuantity(1.5, 'kg', 'g')).toBe(1500);
    expect(convertQuantity(250, 'ml', 'l')).toBe(0.25);
    expect(convertQuantity(3, 'piece', 'g')).toBe(3);
  });
});

describe('misc', () => {
  it('checks season membership', () => {
    expect(isSeasonal([5, 6, 7], 6)).toBe(true);
    expect(isSeasonal([], 6)).toBe(false);
  });

  it('always reports at least one page', () => {
    expect(pageCount(0, 20)).toBe(1);
    expect(pageCount(41, 20)).toBe(3);
  });

  it('rounds to the requested decimals', () => {
    expect(roundTo(2.345, 1)).toBe(2.3);
    expect(roundTo(2.36, 1)).toBe(2.4);
  });
});
