export { createApiRouter, createApp, startServer } from './server';
