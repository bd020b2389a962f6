import http from 'http';
import { createServer } from './index';
import { config } from './config/env';

async function main() {
  const app = await createServer();
  const port = config.port;
  const server = http.createServer(app);

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.syscall !== 'listen') throw error;

    switch (error.code) {
      case 'EACCES':
        console.error(`Port ${port} requires elevated privileges`);
        process.exit(1);
      case 'EADDRINUSE':
        console.error(`Port ${port} is already in use`);
        process.exit(1);
      default:
        throw error;
    }
  });

  server.listen(port, '0.0.0.0', () => {
    console.log('\n🚀 ===== Server Started =====');
    console.log(`🌐 Local:  http://localhost:${port}`);
    console.log(`🔧 API:    http://localhost:${port}/api`);
    console.log(`🏷️  Mode:   ${config.nodeEnv}`);
    console.log('🚀 ========================\n');
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 Received ${signal}, shutting down gracefully`);
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  console.error('Failed to start API server:', err);
  process.exit(1);
});
