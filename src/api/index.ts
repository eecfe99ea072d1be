export { EstimatorApiServer } from './server.js';
export type { ApiServerConfig } from './server.js';
export { sendError } from './routes/api.js';
export type { ApiContext } from './routes/api.js';
