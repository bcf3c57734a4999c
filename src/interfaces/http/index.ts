export { default as eventRoutes } from './event-routes.js';
export { default as statsRoutes } from './stats-routes.js';
export type { StatsRoutesOptions } from './stats-routes.js';
export { extractClientIp, extractGenerationTime, isPrivateIp } from './request-origin.js';
