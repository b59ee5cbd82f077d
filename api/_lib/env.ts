// api/_lib/env.ts - Environment configuration for the risk analysis service
export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  SERVICE_NAME: process.env.SERVICE_NAME || 'buried-risk-api',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_SILENT: process.env.LOG_SILENT === '1',
  PRETTY_LOGS: process.env.PRETTY_LOGS === '1',
  PORT: Number(process.env.PORT || 8080),
  CORS_ORIGINS: process.env.CORS_ORIGINS || '*',
  RISK_DATA_DIR: process.env.RISK_DATA_DIR || '',
  RISK_SIMILARITY_THRESHOLD: process.env.RISK_SIMILARITY_THRESHOLD || '',
  RISK_WINDOW_MINUTES: process.env.RISK_WINDOW_MINUTES || '',
  RISK_GAP_GRACE_WINDOWS: process.env.RISK_GAP_GRACE_WINDOWS || '',
  RISK_LEADERSHIP_ROLES: process.env.RISK_LEADERSHIP_ROLES || '',
  MAX_MESSAGES_PER_REQUEST: Number(process.env.MAX_MESSAGES_PER_REQUEST || 10000),
};
