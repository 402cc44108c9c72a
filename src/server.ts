import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { UserStore, seedUsers } from './data/users';

dotenv.config();

// Start server
function startServer() {
  try {
    const config = loadConfig();
    const app = createApp({ store: new UserStore(seedUsers) });

    const onListening = () => {
      const base = `http://${config.host ?? 'localhost'}:${config.port}`;
      console.log(` Server running on port ${config.port}`);
      console.log(` Environment: ${config.environment}`);
      console.log(` Health check available at: ${base}/health`);
      console.log(` API endpoints available at: ${base}/api/users`);
    };
    const server = config.host
      ? app.listen(config.port, config.host, onListening)
      : app.listen(config.port, onListening);

    server.on('error', (error) => {
      console.error('Server error:', error);
      process.exit(1);
    });

    const shutdown = (signal: NodeJS.Signals) => {
      console.log(` ${signal} received, shutting down`);
      server.close((error) => {
        if (error) {
          console.error('Error while closing server:', error);
          process.exit(1);
        }
        process.exit(0);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

startServer();
