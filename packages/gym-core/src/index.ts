export * from './channel';
export * from './errors';
