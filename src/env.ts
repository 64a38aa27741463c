// Environment configuration for the alert triage engine
// Load credentials, endpoints and engine tuning from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') return defaultValue;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // AWS Bedrock
  AWS_ACCESS_KEY_ID: strEnv(process.env.AWS_ACCESS_KEY_ID),
  AWS_SECRET_ACCESS_KEY: strEnv(process.env.AWS_SECRET_ACCESS_KEY),
  BEDROCK_REGION: strEnv(process.env.BEDROCK_REGION || process.env.AWS_REGION, 'us-east-1'),
  BEDROCK_MODEL_ID: strEnv(process.env.BEDROCK_MODEL_ID, 'anthropic.claude-3-sonnet-20240229-v1:0'),

  // Alert source
  ALERTS_FILE: strEnv(process.env.ALERTS_FILE, 'data/alerts.json'),
  DEMO_ALERTS_FILE: strEnv(process.env.DEMO_ALERTS_FILE, 'data/demo_alerts.json'),
  ALERT_LIMIT: parsePositiveInt(process.env.ALERT_LIMIT, 10, 'ALERT_LIMIT'),

  // Actions
  TICKET_WEBHOOK_URL: strEnv(process.env.TICKET_WEBHOOK_URL, 'https://hooks.example.com/tickets'),
  REBOOT_WEBHOOK_URL: strEnv(process.env.REBOOT_WEBHOOK_URL),
  NOTIFY_WEBHOOK_URL: strEnv(process.env.NOTIFY_WEBHOOK_URL),
  SIMULATE_ACTIONS: parseBoolean(process.env.SIMULATE_ACTIONS, true),
  CLIENT_EMAIL_DOMAIN: strEnv(process.env.CLIENT_EMAIL_DOMAIN, 'example.com'),
  ACTION_TIMEOUT_MS: parsePositiveInt(process.env.ACTION_TIMEOUT_MS, 30000, 'ACTION_TIMEOUT_MS'),

  // Classifier retry policy
  RETRY_ATTEMPTS: parsePositiveInt(process.env.RETRY_ATTEMPTS, 3, 'RETRY_ATTEMPTS'),
  RETRY_BASE_DELAY_MS: parsePositiveInt(process.env.RETRY_BASE_DELAY_MS, 1000, 'RETRY_BASE_DELAY_MS'),
  RETRY_MAX_DELAY_MS: parsePositiveInt(process.env.RETRY_MAX_DELAY_MS, 8000, 'RETRY_MAX_DELAY_MS'),
  RETRY_MAX_TOTAL_WAIT_MS: parsePositiveInt(process.env.RETRY_MAX_TOTAL_WAIT_MS, 15000, 'RETRY_MAX_TOTAL_WAIT_MS'),
  CLASSIFIER_TIMEOUT_MS: parsePositiveInt(process.env.CLASSIFIER_TIMEOUT_MS, 30000, 'CLASSIFIER_TIMEOUT_MS'),

  // Reporting
  MANUAL_SECONDS_PER_ALERT: parsePositiveInt(process.env.MANUAL_SECONDS_PER_ALERT, 180, 'MANUAL_SECONDS_PER_ALERT'),
  ALERTS_PER_DAY: parsePositiveInt(process.env.ALERTS_PER_DAY, 50, 'ALERTS_PER_DAY'),
  AUDIT_LOG_FILE: strEnv(process.env.AUDIT_LOG_FILE, 'agent_log.jsonl'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export type Env = typeof env;

export function isClassifierConfigured(): boolean {
  return !!env.AWS_ACCESS_KEY_ID && !!env.AWS_SECRET_ACCESS_KEY && !!env.BEDROCK_REGION;
}

// Log configuration on startup (redact secrets)
export function logConfiguration(demo: boolean) {
  console.log('Alert Triage Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Mode: ${demo ? 'demo (rules classifier)' : 'live (Bedrock classifier)'}`);
  if (!demo) {
    console.log(`  Bedrock region: ${env.BEDROCK_REGION}`);
    console.log(`  Bedrock model: ${env.BEDROCK_MODEL_ID}`);
    console.log(`  Credentials configured: ${isClassifierConfigured()}`);
  }
  console.log(`  Alert limit: ${env.ALERT_LIMIT}`);
  console.log(`  Simulate actions: ${env.SIMULATE_ACTIONS}`);
  console.log(`  Ticket webhook: ${new URL(env.TICKET_WEBHOOK_URL).host}`);
  console.log(`  Retry attempts: ${env.RETRY_ATTEMPTS}`);
  console.log(`  Audit log: ${env.AUDIT_LOG_FILE}`);
}
