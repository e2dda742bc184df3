export { createApp } from './app.js';
export { loadConfig, type ServiceConfig } from './config.js';
export {
  createValidationRouter,
  legacyValidateRequestSchema,
  validateRequestSchema,
  type ServiceDeps,
} from './routes.js';
