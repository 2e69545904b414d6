/**
 * Shared Utilities
 *
 * Pure helpers used by the API and its clients: dates, rounding,
 * nutrition scaling, seasonality, unit conversion and paging.
 */

import { VOLUME_UNITS, WEIGHT_UNITS } from '../constants/categories';
import type { AgeGroup } from '../constants/users';

// ============================================
// Date Utilities
// ============================================

/**
 * Format date as YYYY-MM-DD (UTC)
 */
export function formatDateYMD(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Parse YYYY-MM-DD string to Date (at midnight UTC)
 */
export function parseDateYMD(dateStr: string): Date {
  const [year, month, day] = dateStr.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Add days to a date
 */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setUTCDate(result.getUTCDate() + days);
  return result;
}

/**
 * Check if a date string is a real calendar date in YYYY-MM-DD format
 */
export function isValidDateYMD(dateStr: string): boolean {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(dateStr)) return false;

  const date = parseDateYMD(dateStr);
  return !isNaN(date.getTime()) && formatDateYMD(date) === dateStr;
}

/**
 * Every date from start to end inclusive, as YYYY-MM-DD
 */
export function dateRangeYMD(start: string, end: string): string[] {
  const dates: string[] = [];
  for (let current = parseDateYMD(start); formatDateYMD(current) <= end; current = addDays(current, 1)) {
    dates.push(formatDateYMD(current));
  }
  return dates;
}

// ============================================
// Number Utilities
// ============================================

/**
 * Round to specified decimal places
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

// ============================================
// Nutrition
// ============================================

export interface Macros {
  calories: number;
  protein: number;
  fat: number;
  carbohydrate: number;
}

export interface NutritionFacts extends Macros {
  fiber: number;
}

/**
 * Scale per-100g nutrition facts to a quantity in grams
 */
export function scaleNutrition(per100g: NutritionFacts, quantityGrams: number): NutritionFacts {
  const factor = quantityGrams / 100;
  return {
    calories: roundTo(per100g.calories * factor, 2),
    protein: roundTo(per100g.protein * factor, 2),
    fat: roundTo(per100g.fat * factor, 2),
    carbohydrate: roundTo(per100g.carbohydrate * factor, 2),
    fiber: roundTo(per100g.fiber * factor, 2),
  };
}

export function emptyMacros(): Macros {
  return { calories: 0, protein: 0, fat: 0, carbohydrate: 0 };
}

/**
 * Sum macros across entries
 */
export function sumMacros(entries: Macros[]): Macros {
  return entries.reduce<Macros>(
    (total, entry) => ({
      calories: total.calories + entry.calories,
      protein: total.protein + entry.protein,
      fat: total.fat + entry.fat,
      carbohydrate: total.carbohydrate + entry.carbohydrate,
    }),
    emptyMacros()
  );
}

/**
 * Whether a month (1-12) falls in an ingredient's season list
 */
export function isSeasonal(season: number[], month: number): boolean {
  return season.includes(month);
}

/**
 * Current month (1-12), UTC
 */
export function currentMonth(now: Date = new Date()): number {
  return now.getUTCMonth() + 1;
}

// ============================================
// Profiles
// ============================================

export function getAgeGroup(age: number | null | undefined): AgeGroup {
  if (!age) return 'unknown';
  if (age < 18) return 'teen';
  if (age < 35) return 'young_adult';
  if (age < 60) return 'middle_aged';
  return 'senior';
}

// ============================================
// Units
// ============================================

function unitFamily(unit: string): Record<string, number> | null {
  const key = unit.toLowerCase();
  if (key in WEIGHT_UNITS) return WEIGHT_UNITS;
  if (key in VOLUME_UNITS) return VOLUME_UNITS;
  return null;
}

/**
 * Units combine when they are identical or both weights or both volumes
 */
export function canCombineUnits(from: string, to: string): boolean {
  if (from.toLowerCase() === to.toLowerCase()) return true;
  const family = unitFamily(from);
  return family !== null && family === unitFamily(to);
}

/**
 * Convert an amount between combinable units; incompatible units return the amount unchanged
 */
export function convertQuantity(amount: number, from: string, to: string): number {
  if (from.toLowerCase() === to.toLowerCase()) return amount;
  const family = unitFamily(from);
  if (!family || family !== unitFamily(to)) return amount;
  return roundTo((amount * family[from.toLowerCase()]) / family[to.toLowerCase()], 4);
}

// ============================================
// Paging
// ============================================

/**
 * Number of pages for a result count; an empty result still has one page
 */
export function pageCount(count: number, pageSize: number): number {
  return Math.max(1, Math.ceil(count / pageSize));
}
