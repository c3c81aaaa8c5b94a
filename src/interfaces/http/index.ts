export { default as webhookRoutes } from './webhook-routes.js';
