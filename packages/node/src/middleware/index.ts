/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery, formatZodErrors } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
