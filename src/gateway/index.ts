/**
 * Gateway module public API.
 */

export { createGatewayServer, toErrorResponse } from './server.js';
export type { GatewayServer, ErrorResponse } from './server.js';
