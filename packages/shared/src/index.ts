export * from './constants/categories';
export * from './constants/recipes';
export * from './constants/users';
export * from './schemas';
export * from './utils';
export * from './types';
