import type { StageBinding } from '../types/flow';

/**
 * A templated message handed to the delivery collaborator.
 */
export interface NotificationMessage {
  readonly subject: string;
  readonly to: string[];
  /** Locale to render the template in */
  readonly language?: string;
  readonly template: string;
  readonly templateContext: Record<string, unknown>;
}

/**
 * Delivers notifications. Delivery failures are the dispatcher's concern;
 * `send` resolves once the message has been handed off.
 */
export interface NotificationDispatcher {
  send(stage: StageBinding, message: NotificationMessage): Promise<void>;
}
