export * from './client-identity';
