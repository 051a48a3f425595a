import { RunSummary } from '../types/report';

/**
 * Push notification service using ntfy.sh
 */
export class NotificationService {
  private ntfyTopic: string;
  private ntfyServer: string;

  constructor(ntfyTopic: string, ntfyServer: string = 'https://ntfy.sh') {
    if (!ntfyTopic) {
      throw new Error('Missing required ntfy topic');
    }

    this.ntfyTopic = ntfyTopic;
    this.ntfyServer = ntfyServer.replace(/\/+$/, '');

    console.log(`Notification service initialized with ntfy topic: ${ntfyTopic}`);
  }

  private async publish(body: {
    title: string;
    message: string;
    tags: string[];
    priority: number;
  }): Promise<void> {
    const response = await fetch(`${this.ntfyServer}/${this.ntfyTopic}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ topic: this.ntfyTopic, ...body }),
    });

    if (!response.ok) {
      throw new Error(`ntfy request failed: ${response.status} ${response.statusText}`);
    }
  }

  /**
   * Send summary notification once a run finishes
   */
  async sendRunSummary(summary: RunSummary): Promise<void> {
    const title = summary.daysFailed > 0 ? '⚠️ Reactor status scrape finished with failures' : '📊 Reactor status scrape complete';
    const lines = [
      `${summary.recordsWritten} records from ${summary.daysProcessed} days`,
      `${summary.daysFailed} days failed`,
      `Output: ${summary.outputPath}`,
    ];

    try {
      await this.publish({
        title,
        message: lines.join('\n'),
        tags: ['chart_with_upwards_trend'],
        priority: summary.daysFailed > 0 ? 4 : 2,
      });
      console.log('Summary notification sent');
    } catch (error) {
      console.error('Failed to send summary notification:', error);
      // Don't throw - summaries are optional
    }
  }

  /**
   * Send error notification when a run aborts
   */
  async sendErrorNotification(error: string, context?: string): Promise<void> {
    try {
      await this.publish({
        title: '🚨 Reactor Status Scraper Error',
        message: `${context ? `Context: ${context}\n` : ''}Error: ${error}`,
        tags: ['warning', 'error'],
        priority: 5,
      });
      console.log('Error notification sent successfully');
    } catch (ntfyError) {
      console.error('Failed to send error notification:', ntfyError);
      // Don't throw here to avoid cascading failures
    }
  }
}
