export { buildApp } from './app.js';
export type { AppOptions } from './app.js';
export { default as fanoutPlugin } from './fanout-plugin.js';
export { default as streamRoutes, SERVICE_VERSION } from './stream-routes.js';
export { default as audienceRoutes, NICKNAME_CATEGORY, audienceCategory } from './audience-routes.js';
