export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export {
  authMiddleware,
  openAccessMiddleware,
  requirePermission,
  API_KEY_HEADER,
  ACCOUNT_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { validateBody, formatZodErrors } from "./validate.js";
export { createErrorHandler, handleError, STATUS_MAP } from "./error-handler.js";
export type { ErrorReporter } from "./error-handler.js";
