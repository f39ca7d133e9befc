import { log } from './logger';
import { counter } from './metrics';
import { systemClock, type Clock } from './time';

export type AlertPriority = 'info' | 'warn' | 'critical';

/** Fire-and-forget operator notification. Never throws, never blocks the caller. */
export interface Notifier {
  notify(subject: string, body: Record<string, unknown>, priority?: AlertPriority): void;
}

export type AlertTransport = (subject: string, body: Record<string, unknown>, priority: AlertPriority) => Promise<void>;

export type WebhookNotifierOptions = {
  slackWebhook?: string;
  pagerDutyKey?: string;
  minIntervalMs: number;
  clock?: Clock;
  /** Replaces the Slack/PagerDuty transports. */
  transports?: AlertTransport[];
};

const alertLog = log.child({ module: 'infra.alerts' });

async function postJson(url: string, payload: unknown): Promise<void> {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(payload),
  });
  if (!res.ok) {
    const text = await res.text();
    throw new Error(`alert post to ${new URL(url).host} failed with ${res.status}: ${text.slice(0, 200)}`);
  }
}

export function slackTransport(webhook: string): AlertTransport {
  return async (subject, body, priority) => {
    const meta = Object.entries(body)
      .map(([k, v]) => `• *${k}*: ${typeof v === 'object' ? JSON.stringify(v) : String(v)}`)
      .join('\n');
    const emoji = priority === 'critical' ? ':rotating_light:' : priority === 'warn' ? ':warning:' : ':information_source:';
    await postJson(webhook, { text: `${emoji} ${subject}\n${meta}` });
  };
}

export function pagerDutyTransport(routingKey: string): AlertTransport {
  return async (subject, body, priority) => {
    await postJson('https://events.pagerduty.com/v2/enqueue', {
      routing_key: routingKey,
      event_action: 'trigger',
      payload: {
        summary: subject,
        source: 'onchain-arb-engine',
        severity: priority === 'critical' ? 'critical' : priority === 'warn' ? 'warning' : 'info',
        custom_details: body,
      },
    });
  };
}

/**
 * Logs every alert and forwards it to the configured webhooks. Repeats of the
 * same subject inside `minIntervalMs` are dropped unless they are critical.
 */
export class WebhookNotifier implements Notifier {
  private readonly lastSent = new Map<string, number>();
  private readonly transports: AlertTransport[];
  private readonly clock: Clock;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: WebhookNotifierOptions) {
    this.clock = options.clock ?? systemClock;
    if (options.transports) {
      this.transports = options.transports;
    } else {
      this.transports = [];
      if (options.slackWebhook) this.transports.push(slackTransport(options.slackWebhook));
      if (options.pagerDutyKey) this.transports.push(pagerDutyTransport(options.pagerDutyKey));
    }
  }

  notify(subject: string, body: Record<string, unknown>, priority: AlertPriority = 'warn'): void {
    const now = this.clock();
    const last = this.lastSent.get(subject);
    if (priority !== 'critical' && last !== undefined && now - last < this.options.minIntervalMs) {
      counter.alerts.inc({ priority, result: 'rate-limited' });
      alertLog.debug({ subject }, 'alert-rate-limited');
      return;
    }
    this.lastSent.set(subject, now);
    const level = priority === 'critical' ? 'error' : priority === 'warn' ? 'warn' : 'info';
    alertLog[level]({ subject, body, priority }, 'alert');
    counter.alerts.inc({ priority, result: 'sent' });

    const dispatch = this.dispatch(subject, body, priority);
    this.inFlight.add(dispatch);
    void dispatch.finally(() => this.inFlight.delete(dispatch));
  }

  /** Waits for deliveries already started; used on shutdown. */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async dispatch(subject: string, body: Record<string, unknown>, priority: AlertPriority): Promise<void> {
    const results = await Promise.allSettled(this.transports.map((send) => send(subject, body, priority)));
    for (const result of results) {
      if (result.status === 'rejected') {
        const reason: unknown = result.reason;
        counter.alerts.inc({ priority, result: 'failed' });
        alertLog.warn({ subject, err: reason instanceof Error ? reason.message : String(reason) }, 'alert-post-failed');
      }
    }
  }
}

export function notifierFromEnv(minIntervalMs: number): WebhookNotifier {
  return new WebhookNotifier({
    slackWebhook: process.env.SLACK_WEBHOOK_URL,
    pagerDutyKey: process.env.PAGERDUTY_API_KEY,
    minIntervalMs,
  });
}
