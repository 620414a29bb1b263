export { buildServer, startServer } from './server.js';
export type { ServerOptions } from './server.js';
export { AppError, toAppError, runFailed } from './errors.js';
export type { ErrorPayload } from './errors.js';
