import { Command } from 'commander';

export const startCommand = new Command('start')
  .description('Start the ingestion service')
  .option('-p, --port <port>', 'Port to listen on', '5380')
  .option('--no-redis', 'Use the in-memory record store and drop events')
  .action(async (options: { port: string; redis: boolean }) => {
    process.env.PORT = options.port;
    if (!options.redis) {
      process.env.REDIS_ENABLED = 'false';
    }
    console.log(`Starting sluice on port ${options.port}...`);
    // Dynamic import to avoid loading server code for other commands
    const { startServer } = await import('../../server');
    await startServer();
  });
