import { startRenderServer } from './renderServer.js';

const server = startRenderServer();

process.on('SIGINT', () => {
  console.log('[RenderServer] Shutting down');
  server.close(() => process.exit(0));
});
