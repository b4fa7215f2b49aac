// src/middleware/index.ts
export { rateLimitMiddleware, RateLimiter, type RateLimitOptions } from "./rateLimiter";
export { validateEnvironment, type AppConfig, type Env } from "./validateEnv";
export {
  sendSuccess,
  sendError,
  sendNotFound,
  sendValidationError,
  sendServerError,
  type ApiResponse,
} from "./responseHelper";
