export { createApp, startServer } from './app.js';
export type { AppOptions } from './app.js';
