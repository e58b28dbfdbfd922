import { WebClient } from '@slack/web-api';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('alerts');

export type AlertSeverity = 'high' | 'critical';

let slack: WebClient | undefined;

function client(): WebClient | undefined {
  if (!process.env.SLACK_TOKEN) return undefined;
  slack ??= new WebClient(process.env.SLACK_TOKEN);
  return slack;
}

/**
 * Operator alert. Slack is only used in production; the log line is always written.
 */
export async function notify(msg: string, severity: AlertSeverity = 'high') {
  logger.error(`ALERT [${severity}] ${msg}`, { severity });
  if (process.env.NODE_ENV !== 'production') return;
  const web = client();
  if (!web) return;
  try {
    await web.chat.postMessage({ channel: process.env.SLACK_CHANNEL ?? '#alerts', text: `[${severity}] ${msg}` });
  } catch (e) {
    logger.error('Slack alert failed', { error: e instanceof Error ? e.message : String(e) });
  }
}
