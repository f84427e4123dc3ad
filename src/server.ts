#!/usr/bin/env node
import { loadConfig } from './config.js';
import { startHttp } from './connectors/http.js';
import { demoRoutes } from './backend/demo.js';

const config = loadConfig();
const server = startHttp(demoRoutes(), config);

server.on('listening', () => {
  console.log(`Respondable HTTP on ${config.bind}:${config.port}`);
});
server.on('error', (err) => {
  console.error(`[HTTP] Server error: ${err.message}`);
  process.exitCode = 1;
});
