import path from 'path';

export type MysqlConfig = {
  host: string;
  user: string;
  password: string;
  database: string;
};

export type ServerConfig = {
  port: number;
  jwtSecret: string;
  dataDir: string;
  logFile: string;
  logTimings: boolean;
  mysql: MysqlConfig;
};

const DEFAULT_PORT = 5002;

/**
 * Reads server settings from the environment. Values are read once per call;
 * nothing is cached.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const dataDir = env.DATA_DIR ? path.resolve(env.DATA_DIR) : path.resolve(process.cwd(), 'data');
  const port = env.PORT ? parseInt(env.PORT, 10) : DEFAULT_PORT;
  if (isNaN(port) || port <= 0) {
    throw new Error(`Invalid port '${env.PORT}'`);
  }

  return {
    port,
    jwtSecret: env.JWT_SECRET || '',
    dataDir,
    logFile: env.LOG_FILE || path.join(dataDir, 'log.txt'),
    logTimings: env.LOG_TIMINGS === 'true',
    mysql: {
      host: env.MYSQL_HOST || 'localhost',
      user: env.MYSQL_USERNAME || '',
      password: env.MYSQL_PASSWORD || '',
      database: env.MYSQL_DATABASE || '',
    },
  };
}
