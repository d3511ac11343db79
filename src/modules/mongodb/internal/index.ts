export * from './mongodb.types';
export { getDb, getMongoClient, closeMongoClient } from './mongodb.client';
