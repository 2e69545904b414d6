import { getAgeGroup, type HealthProfile, type UserProfile, type UserSummary } from '@smart-recipe/shared';
import type { User, UserProfileRow } from '../../db/schema';

export function serializeHealthProfile(profile: UserProfileRow): HealthProfile {
  return {
    gender: profile.gender,
    age: profile.age,
    dietaryPreference: profile.dietaryPreference,
    allergies: profile.allergies,
    healthGoal: profile.healthGoal,
    dailyCaloriesTarget: profile.dailyCaloriesTarget,
    ageGroup: getAgeGroup(profile.age),
  };
}

export function serializeProfile(user: User, profile: UserProfileRow): UserProfile {
  return {
    id: profile.id,
    user: {
      id: user.id,
      username: user.username,
      email: user.email,
      dateJoined: user.createdAt,
    },
    nickname: profile.nickname,
    avatar: profile.avatar,
    gender: profile.gender,
    age: profile.age,
    phone: profile.phone,
    dietaryPreference: profile.dietaryPreference,
    allergies: profile.allergies,
    healthGoal: profile.healthGoal,
    dailyCaloriesTarget: profile.dailyCaloriesTarget,
    ageGroup: getAgeGroup(profile.age),
    createdAt: profile.createdAt,
    updatedAt: profile.updatedAt,
  };
}

// Nickname falls back to the username when the profile has none
export function serializeUserSummary(
  user: Pick<User, 'id' | 'username'>,
  profile: Pick<UserProfileRow, 'nickname'> | null | undefined
): UserSummary {
  return {
    id: user.id,
    username: user.username,
    nickname: profile?.nickname || user.username,
  };
}
