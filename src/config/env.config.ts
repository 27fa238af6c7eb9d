export interface EnvConfig {
  PORT: number;
  ALLOWED_ORIGINS: string;
  HEARTBEAT_INTERVAL_MS: number;
  WORKER_POOL_SIZE: number;
  IDENTIFIED_BY: string;
}

export default (): EnvConfig => ({
  PORT: parseInt(process.env.PORT ?? '3000', 10),
  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS ?? 'http://localhost:3000',
  HEARTBEAT_INTERVAL_MS: parseInt(process.env.HEARTBEAT_INTERVAL_MS ?? '3000', 10),
  WORKER_POOL_SIZE: parseInt(process.env.WORKER_POOL_SIZE ?? '4', 10),
  IDENTIFIED_BY: process.env.IDENTIFIED_BY ?? 'user',
});
