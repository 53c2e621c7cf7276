export interface DatabricksConfig {
  host: string;
  token: string;
  apiVersion: string;
  timeoutMs: number;
}

const DEFAULT_TIMEOUT_SECONDS = 60;

/**
 * Shared workspace connection settings, read from the environment
 */
export function getDatabricksConfig(env: NodeJS.ProcessEnv = process.env): DatabricksConfig {
  const host = env.DATABRICKS_HOST;
  const token = env.DATABRICKS_TOKEN;
  if (!host || !token) {
    throw new Error('DatabricksClient is not configured');
  }

  const timeoutSeconds = env.DATABRICKS_TIMEOUT_SECONDS
    ? parseInt(env.DATABRICKS_TIMEOUT_SECONDS, 10)
    : DEFAULT_TIMEOUT_SECONDS;

  return {
    host: host.startsWith('http') ? host.replace(/\/+$/, '') : `https://${host.replace(/\/+$/, '')}`,
    token,
    apiVersion: env.DATABRICKS_API_VERSION || '2.0',
    timeoutMs: (Number.isFinite(timeoutSeconds) && timeoutSeconds > 0 ? timeoutSeconds : DEFAULT_TIMEOUT_SECONDS) * 1000,
  };
}
