import 'dotenv/config';
import { pool } from './db';
import { createApp } from './app';
import { getTransferSettings } from './config/transferSettings';
import { requiredEnv } from './config/env';

const PORT = Number(process.env.PORT) || 3000;

requiredEnv('JWT_SECRET');
requiredEnv('ENCRYPTION_KEY');
// Fails on a malformed quotation prefix before the first request does.
getTransferSettings();

pool.on('error', (err) => {
  console.error(JSON.stringify({ event: 'db_pool_error', error: err.message, timestamp: new Date().toISOString() }));
});

const server = createApp().listen(PORT, () => {
  console.log(JSON.stringify({ event: 'server_started', port: PORT, timestamp: new Date().toISOString() }));
});

function shutdown(signal: string) {
  console.log(JSON.stringify({ event: 'server_stopping', signal, timestamp: new Date().toISOString() }));
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      }
    );
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
