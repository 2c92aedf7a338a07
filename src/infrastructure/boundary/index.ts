export { buildBoundaryServer, boundaryRoutesPlugin, listenOnLoopback } from './boundary-server.js';
export type { BoundaryServerOptions, BoundaryRoutesOptions } from './boundary-server.js';
export { BoundaryClient } from './boundary-client.js';
export type { BoundaryClientOptions } from './boundary-client.js';
export { bearerHeader, isAuthorized, isLoopbackHost } from './credential.js';
