export { default as loginRoutes } from './login-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { default as throttlePlugin } from './throttle-plugin.js';
export type { LoginRoutesOptions } from './login-routes.js';
export type { HealthRoutesOptions } from './health-routes.js';
export type { ThrottleOptions } from './throttle-plugin.js';
