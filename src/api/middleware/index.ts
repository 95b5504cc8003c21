/**
 * Middleware exports
 */

export { errorHandler } from './error.middleware.js';
export { requestLogger } from './request-logger.middleware.js';
export { responseMeta, sendData } from './response.js';
