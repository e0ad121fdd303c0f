import { ConfigurationError } from '../errors';
import { NotificationDecision, PropertyResult } from '../types/property';
import { isVacantProperty } from './results';

export interface NotificationConfig {
  ntfyServer: string;
  ntfyTopic?: string;
}

interface NotificationEntry {
  result: PropertyResult;
  label?: string;
}

/**
 * Push notification service using ntfy.sh
 */
export class NotificationService {
  private ntfyTopic: string;
  private ntfyServer: string;

  constructor(config: NotificationConfig) {
    if (!config.ntfyTopic) {
      throw new ConfigurationError('Missing required NTFY_TOPIC environment variable');
    }

    this.ntfyTopic = config.ntfyTopic;
    this.ntfyServer = config.ntfyServer.replace(/\/+$/, '');

    console.log(`Notification service initialized with ntfy topic: ${this.ntfyTopic}`);
  }

  /**
   * Send a push notification for a positive decision. On a first run or a
   * failed comparison there are no diff entries, so every currently vacant
   * property is listed instead.
   */
  async sendVacancyNotification(decision: NotificationDecision, results: PropertyResult[]): Promise<void> {
    if (!decision.shouldNotify) {
      console.log('Decision says no notification is needed');
      return;
    }

    const entries: NotificationEntry[] =
      decision.newlyVacant.length > 0
        ? decision.newlyVacant.map(entry => ({ result: entry.result, label: entry.changeType }))
        : results.filter(isVacantProperty).map(result => ({ result }));

    const { title, message } = this.formatVacancyNotification(decision, entries);

    try {
      const response = await this.post({
        title,
        message,
        tags: ['house', 'key'],
        priority: 4, // High priority
        actions:
          entries.length === 1
            ? [{ action: 'view', label: 'View Listing', url: entries[0].result.url }]
            : [],
      });

      if (!response.ok) {
        throw new Error(`ntfy request failed: ${response.status} ${response.statusText}`);
      }

      console.log('Notification sent successfully');
    } catch (error) {
      console.error('Failed to send ntfy notification:', error);
      throw new Error(`Notification sending failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Title and body for a vacancy notification
   */
  formatVacancyNotification(
    decision: NotificationDecision,
    entries: NotificationEntry[]
  ): { title: string; message: string } {
    let title: string;
    if (decision.isFirstRun) {
      title = 'Vacancy Watch Started';
    } else if (decision.summary.error) {
      title = 'Vacancy Check: Comparison Failed';
    } else if (entries.length === 1) {
      title = 'New Vacancy Available';
    } else {
      title = `${entries.length} New Vacancies Available`;
    }

    if (entries.length === 0) {
      return { title, message: `${decision.reason} - no vacant units right now` };
    }

    if (entries.length <= 3) {
      const lines = entries.map(({ result, label }) => {
        const first = result.units[0];
        const unitWord = result.unitCount === 1 ? 'unit' : 'units';
        const detail = first ? ` - ${first.layout} ${first.rent}` : '';
        return `${result.name}: ${result.unitCount} ${unitWord}${label ? ` (${label})` : ''}${detail}`;
      });
      return { title, message: lines.join(' | ') };
    }

    const totalUnits = entries.reduce((sum, { result }) => sum + result.unitCount, 0);
    return { title, message: `${totalUnits} vacant units across ${entries.length} properties` };
  }

  /**
   * Send error notification to admin
   */
  async sendErrorNotification(error: string, context?: string): Promise<void> {
    try {
      const response = await this.post({
        title: '🚨 Vacancy Watcher Error',
        message: `${context ? `Context: ${context}\n` : ''}Error: ${error}`,
        tags: ['warning', 'error'],
        priority: 5, // Max priority for errors
      });

      if (!response.ok) {
        throw new Error(`ntfy error notification failed: ${response.status}`);
      }

      console.log('Error notification sent successfully');
    } catch (ntfyError) {
      console.error('Failed to send error notification:', ntfyError);
      // Don't throw here to avoid cascading failures
    }
  }

  /**
   * Test notification functionality
   */
  async testNotification(): Promise<boolean> {
    try {
      const response = await this.post({
        title: '🧪 Test Notification',
        message: 'Vacancy watcher notification system is working!',
        tags: ['test'],
        priority: 3,
      });

      if (!response.ok) {
        throw new Error(`Test notification failed: ${response.status}`);
      }

      console.log('Test notification sent successfully');
      return true;
    } catch (error) {
      console.error('Test notification failed:', error);
      return false;
    }
  }

  private post(payload: {
    title: string;
    message: string;
    tags: string[];
    priority: number;
    actions?: Array<{ action: string; label: string; url: string }>;
  }): Promise<Response> {
    return fetch(this.ntfyServer, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ topic: this.ntfyTopic, ...payload }),
    });
  }
}
