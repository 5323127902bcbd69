import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../errors.js';

export type AlertSeverity = 'info' | 'warning' | 'critical';
export type AlertEventType = 'high_latency' | 'database_disconnected';

export interface AlertEvent {
  type: AlertEventType;
  severity: AlertSeverity;
  title: string;
  description: string;
  timestamp: Date;
}

/**
 * Outbound notifications. Triggers return immediately; delivery happens in the
 * background and its failures are logged, never thrown.
 */
export interface AlertSink {
  readonly enabled: boolean;
  alertHighLatency(inferenceTimeMs: number, thresholdMs: number): void;
  alertDatabaseDisconnected(detail: string): void;
  /** Resolves once every in-flight delivery has settled. */
  flush(): Promise<void>;
}

// Discord embed colours
const SEVERITY_COLORS: Record<AlertSeverity, number> = {
  info: 0x3498db,
  warning: 0xf39c12,
  critical: 0xe74c3c,
};

export interface DiscordAlertSinkOptions {
  webhookUrl: string;
  timeoutMs: number;
  username?: string;
  http?: AxiosInstance;
}

export class DiscordAlertSink implements AlertSink {
  readonly enabled = true;
  private readonly webhookUrl: string;
  private readonly username: string;
  private readonly http: AxiosInstance;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: DiscordAlertSinkOptions) {
    this.webhookUrl = options.webhookUrl;
    this.username = options.username ?? 'Pet Classifier Monitor';
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
  }

  alertHighLatency(inferenceTimeMs: number, thresholdMs: number): void {
    this.send({
      type: 'high_latency',
      severity: 'warning',
      title: 'High inference latency',
      description: `Inference took ${inferenceTimeMs} ms (threshold ${thresholdMs} ms).`,
      timestamp: new Date(),
    });
  }

  alertDatabaseDisconnected(detail: string): void {
    this.send({
      type: 'database_disconnected',
      severity: 'critical',
      title: 'Database disconnected',
      description: `Health check could not reach the prediction database: ${detail}`,
      timestamp: new Date(),
    });
  }

  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  buildPayload(event: AlertEvent) {
    return {
      username: this.username,
      embeds: [
        {
          title: event.title,
          description: event.description,
          color: SEVERITY_COLORS[event.severity],
          timestamp: event.timestamp.toISOString(),
          fields: [
            { name: 'Event', value: event.type, inline: true },
            { name: 'Severity', value: event.severity.toUpperCase(), inline: true },
          ],
        },
      ],
    };
  }

  private send(event: AlertEvent): void {
    const delivery = this.deliver(event).finally(() => {
      this.pending.delete(delivery);
    });
    this.pending.add(delivery);
  }

  private async deliver(event: AlertEvent): Promise<void> {
    try {
      await this.http.post(this.webhookUrl, this.buildPayload(event));
      console.log(`[Alerts] Sent ${event.type} (${event.severity})`);
    } catch (error) {
      console.error(`[Alerts] ${event.type} delivery failed: ${errorMessage(error)}`);
    }
  }
}

export class NoopAlertSink implements AlertSink {
  readonly enabled = false;
  alertHighLatency(): void {}
  alertDatabaseDisconnected(): void {}
  async flush(): Promise<void> {}
}
