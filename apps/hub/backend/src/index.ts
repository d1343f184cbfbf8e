/**
 * Resource Hub API Server
 * Main entry point for the hub backend service
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import { serve } from '@hono/node-server';
import { ResourceHub } from '@ephemera/core';
import { createApp } from './app.js';

export const hub = ResourceHub.fromEnv();

const app = createApp(hub);

// Start server only if run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const port = parseInt(process.env.PORT || '4000', 10);

  const start = async () => {
    const loaded = await hub.init();
    if (!loaded.ok) {
      console.error('Failed to initialise resource storage:', loaded.error);
      process.exit(1);
    }

    console.log(`Starting Resource Hub API on port ${port}...`);

    const server = serve({
      fetch: app.fetch,
      port,
    }, (info) => {
      console.log(`✓ Resource Hub API running at http://localhost:${info.port}`);
      console.log(`  Environment: ${process.env.NODE_ENV || 'development'}`);
      console.log(`  Storage: ${hub.store.storagePath} (${loaded.value} resources)`);
    });

    const shutdown = () => {
      server.close();
      hub.close()
        .then((flushed) => {
          if (!flushed.ok) {
            console.error('Final metadata flush failed:', flushed.error);
          }
          process.exit(0);
        })
        .catch((error) => {
          console.error('Shutdown error:', error);
          process.exit(1);
        });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  };

  start().catch((error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}

export default app;
