/**
 * API Middleware
 */

export { registerDbSession } from './dbSession.js';
