// Barrel-файл HTTP-модуля.
export { createApp } from './app.js';
export type { AppDeps } from './app.js';
export { startServer } from './start.js';
export type { StartedServer } from './start.js';
