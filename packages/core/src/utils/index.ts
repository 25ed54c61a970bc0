export { generateId, generateKey, now } from './id';
