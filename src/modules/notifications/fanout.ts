import { randomUUID } from 'node:crypto';
import { NotFoundError, VersionConflictError } from '../../errors.js';
import {
  notificationSchema,
  type Notification,
  type NotificationKind,
  type SourceRef,
} from '../../domain/entities.js';
import type { RelationalStore } from '../../stores/types.js';

const MESSAGES: Record<NotificationKind, string> = {
  lead_contacted: 'Lead was contacted',
  lead_lost: 'Lead was marked as lost',
  offer_sent: 'A new offer was sent to you',
  offer_rejected: 'Offer was rejected',
  offer_expired: 'Offer expired without a decision',
  installation_scheduled: 'You were assigned an installation',
  installation_done: 'Installation completed',
  installation_undone: 'Installation missed its deadline and needs rescheduling',
  lead_follow_up_due: 'A lead is due for follow-up',
  offer_stale: 'A sent offer has had no response',
};

export interface ListNotificationsOptions {
  unreadOnly?: boolean;
  limit?: number;
}

/**
 * Inbox writes for lifecycle events. `notify` is a single relational insert;
 * any push channel is someone else's concern.
 */
export class NotificationFanout {
  constructor(private readonly relational: RelationalStore) {}

  notify(recipientId: string, kind: NotificationKind, source: SourceRef): Promise<Notification> {
    return this.insert(randomUUID(), recipientId, kind, source);
  }

  /**
   * Like `notify`, but at most once per recipient, kind, source record and
   * occasion. The row id is derived from all four, so a repeat is an insert
   * conflict. Returns false when the reminder already exists.
   */
  async notifyOnce(
    recipientId: string,
    kind: NotificationKind,
    source: SourceRef,
    occasion: string
  ): Promise<boolean> {
    const id = [kind, source.entity_type, source.id, occasion, recipientId].join(':');
    try {
      await this.insert(id, recipientId, kind, source);
      return true;
    } catch (error) {
      if (error instanceof VersionConflictError) return false;
      throw error;
    }
  }

  private async insert(
    id: string,
    recipientId: string,
    kind: NotificationKind,
    source: SourceRef
  ): Promise<Notification> {
    const row = await this.relational.write(
      'notification',
      {
        id,
        recipient_id: recipientId,
        kind,
        message: MESSAGES[kind],
        source,
        is_read: false,
      },
      0
    );
    return notificationSchema.parse(row);
  }

  async list(recipientId: string, options: ListNotificationsOptions = {}): Promise<Notification[]> {
    const notifications: Notification[] = [];
    const query = this.relational.query('notification', {
      eq: options.unreadOnly ? { recipient_id: recipientId, is_read: false } : { recipient_id: recipientId },
      orderBy: { column: 'created_at', ascending: false },
      limit: options.limit ?? 50,
    });

    for await (const row of query) {
      notifications.push(notificationSchema.parse(row));
    }
    return notifications;
  }

  async unreadCount(recipientId: string): Promise<number> {
    return this.relational.count('notification', { eq: { recipient_id: recipientId, is_read: false } });
  }

  /** Marks one notification, or all of the recipient's, as read. Returns how many changed. */
  async markRead(recipientId: string, target: string | 'all'): Promise<number> {
    if (target !== 'all') {
      const row = await this.relational.read('notification', target);
      const notification = row ? notificationSchema.parse(row) : null;
      if (!notification || notification.recipient_id !== recipientId) {
        throw new NotFoundError('notification', target);
      }
      if (notification.is_read) return 0;
      await this.relational.write('notification', { id: notification.id, is_read: true }, notification.version);
      return 1;
    }

    const unread = await this.list(recipientId, { unreadOnly: true, limit: Number.POSITIVE_INFINITY });
    let changed = 0;
    for (const notification of unread) {
      try {
        await this.relational.write('notification', { id: notification.id, is_read: true }, notification.version);
        changed += 1;
      } catch (error) {
        // Someone else already touched it; it is read or about to be.
        if (!(error instanceof VersionConflictError)) throw error;
      }
    }
    return changed;
  }
}
