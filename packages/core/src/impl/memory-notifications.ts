import type { StageBinding } from '../types/flow';
import type { NotificationDispatcher, NotificationMessage } from '../interfaces/notification-dispatcher';

export interface SentNotification {
  readonly stageId: string;
  readonly message: NotificationMessage;
}

/**
 * Collects messages instead of delivering them.
 */
export class MemoryNotificationDispatcher implements NotificationDispatcher {
  readonly outbox: SentNotification[] = [];

  async send(stage: StageBinding, message: NotificationMessage): Promise<void> {
    this.outbox.push({ stageId: stage.id, message: structuredClone(message) });
  }

  last(): SentNotification | undefined {
    return this.outbox[this.outbox.length - 1];
  }

  clear(): void {
    this.outbox.length = 0;
  }
}
