export * from './users';
export * from './ingredients';
export * from './recipes';
export * from './shopping';
export * from './community';
export * from './nutrition';
