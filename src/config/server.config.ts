import * as dotenv from 'dotenv';

dotenv.config();

const DEFAULT_PORT = 3000;

export function parsePort(raw: string | undefined): number {
  const port = parseInt(raw || `${DEFAULT_PORT}`, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    return DEFAULT_PORT;
  }
  return port;
}

export const serverConfig = {
  // Listen on all interfaces unless told otherwise
  host: process.env.HOST || '0.0.0.0',
  port: parsePort(process.env.PORT),
  logLevel: process.env.LOG_LEVEL || 'info'
};
