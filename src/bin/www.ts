#!/usr/bin/env node

import debug from 'debug';
import http from 'http';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { createBlogDb, createBlogPool } from '../db/blog-db';
import { MemoryCacheBackend } from '../cache/memoryCache';
import { createServices } from '../services';

const debugLog = debug('blog:server');

const config = loadConfig();
const pool = createBlogPool(config.databaseUrl);
const services = createServices({
  db: createBlogDb(pool),
  cacheBackend: new MemoryCacheBackend(),
  config,
});
const app = createApp({ services, config });

const port = normalizePort(config.port);
app.set('port', port);

const server = http.createServer(app);

server.listen(port);
server.on('error', onError);
server.on('listening', onListening);

console.log(`🚀 Server starting on port ${port}`);
console.log(`📍 Environment: ${config.env}`);

// Close the HTTP server, then the pool
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    console.log(`${signal} received, shutting down...`);
    server.close(() => {
      pool.end()
        .then(() => {
          console.log('Blog pool closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Failed to close blog pool', error);
          process.exit(1);
        });
    });
  });
}

/** A number, a named pipe, or false for a negative port. */
function normalizePort(val: string): number | string | false {
  const portNum = parseInt(val, 10);

  if (isNaN(portNum)) {
    // named pipe
    return val;
  }

  if (portNum >= 0) {
    // port number
    return portNum;
  }

  return false;
}

function onError(error: NodeJS.ErrnoException): void {
  if (error.syscall !== 'listen') {
    throw error;
  }

  const bind = typeof port === 'string'
    ? 'Pipe ' + port
    : 'Port ' + port;

  // handle specific listen errors with friendly messages
  switch (error.code) {
    case 'EACCES':
      console.error(bind + ' requires elevated privileges');
      process.exit(1);
      break;
    case 'EADDRINUSE':
      console.error(bind + ' is already in use');
      process.exit(1);
      break;
    default:
      throw error;
  }
}

function onListening(): void {
  const addr = server.address();
  const bind = typeof addr === 'string'
    ? 'pipe ' + addr
    : 'port ' + addr?.port;
  debugLog('Listening on ' + bind);
  console.log(`✅ Server is running and listening on ${bind}`);
}
