export * from './rule';
export * from './quirk';
export * from './factory';
