export { default as eventRoutes } from './event-routes.js';
export { default as queryRoutes } from './query-routes.js';
export { default as definitionRoutes } from './definition-routes.js';
export { default as activationRoutes } from './activation-routes.js';
export { default as auditRoutes } from './audit-routes.js';
export { default as errorHandlerPlugin, handleError } from './error-handler.js';
