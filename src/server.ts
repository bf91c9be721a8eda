import 'dotenv/config';
import { createApp } from './app';
import { resolveSchedulerStartupMode } from './config/schedulerStartup';
import { closePool, getPool } from './db';
import { registerInventoryJobs } from './jobs';
import { startScheduler, stopScheduler } from './jobs/scheduler';

const PORT = Number(process.env.PORT) || 3000;

const app = createApp();

getPool().on('error', (err) => {
  console.error('Unexpected DB pool error', err);
});

const scheduler = resolveSchedulerStartupMode();
if (scheduler.schedulerEnabled) {
  registerInventoryJobs();
  startScheduler();
}

const server = app.listen(PORT, () => {
  console.log(`Stock ledger API listening on port ${PORT}`);
});

function shutdown(signal: string) {
  console.log(`Received ${signal}, shutting down`);
  stopScheduler();
  server.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Failed to close DB pool', error);
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
