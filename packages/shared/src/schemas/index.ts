export * from './enums';
export * from './user';
export * from './ingredient';
export * from './recipe';
export * from './shopping';
export * from './community';
export * from './nutrition';
