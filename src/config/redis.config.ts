import { registerAs } from '@nestjs/config';

/**
 * Redis backs the shared rate cache tier. Leaving REDIS_URL empty runs the
 * service on its in-process tier alone.
 */
export default registerAs('redis', () => ({
  url: process.env.REDIS_URL || '',
  commandTimeoutMs: parseInt(process.env.REDIS_COMMAND_TIMEOUT_MS || '500', 10),
}));
