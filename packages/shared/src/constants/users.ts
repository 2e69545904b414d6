export const USER_ROLES = ['admin', 'member'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export const GENDERS = [
  { id: 'male', name: 'Male' },
  { id: 'female', name: 'Female' },
  { id: 'other', name: 'Other' },
] as const;

export type Gender = (typeof GENDERS)[number]['id'];

export const HEALTH_GOALS = [
  { id: 'lose_weight', name: 'Lose weight' },
  { id: 'gain_muscle', name: 'Gain muscle' },
  { id: 'maintain', name: 'Stay healthy' },
  { id: 'improve_nutrition', name: 'Improve nutrition' },
] as const;

export type HealthGoal = (typeof HEALTH_GOALS)[number]['id'];

export const AGE_GROUPS = ['unknown', 'teen', 'young_adult', 'middle_aged', 'senior'] as const;

export type AgeGroup = (typeof AGE_GROUPS)[number];

// Profile value bounds
export const AGE_RANGE = { min: 1, max: 150 } as const;
export const DAILY_CALORIES_RANGE = { min: 500, max: 5000 } as const;
