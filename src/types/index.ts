export * from './catalog';
export * from './participant';
export * from './reading';
export * from './extraction';
