import type { Knex } from 'knex';
import type { Database } from '../db/connection.js';
import { oneOf, toBool, toIso, type ApprovalNotificationRow } from '../db/rows.js';
import type { Notification, NotificationInput, NotificationType } from './types.js';

const NOTIFICATION_TYPES: readonly NotificationType[] = ['APPROVAL_REQUEST', 'APPROVED', 'REJECTED', 'WITHDRAWN', 'REASSIGNED'];

/** Enqueues notifications for an external deliverer. Called after the transition commits. */
export interface NotificationDispatcher {
  enqueue(notifications: readonly NotificationInput[], createdAt: string): Promise<void>;
}

function toNotification(row: ApprovalNotificationRow): Notification {
  return {
    id: Number(row.id),
    recipient: row.recipient,
    notificationType: oneOf(NOTIFICATION_TYPES, row.notification_type, 'notification_type'),
    subject: row.subject,
    message: row.message,
    workflowInstanceId: Number(row.workflow_instance_id),
    createdAt: toIso(row.created_at),
    isRead: toBool(row.is_read)
  };
}

export class KnexNotificationDispatcher implements NotificationDispatcher {
  constructor(private readonly database: Database) {}

  async enqueue(notifications: readonly NotificationInput[], createdAt: string): Promise<void> {
    if (notifications.length === 0) return;
    await this.database.knex('approval_notifications').insert(
      notifications.map((notification) => ({
        workflow_instance_id: notification.workflowInstanceId,
        recipient: notification.recipient,
        notification_type: notification.notificationType,
        subject: notification.subject,
        message: notification.message,
        created_at: createdAt,
        is_read: false
      }))
    );
  }

  async listForRecipient(
    recipient: string,
    options: { unreadOnly?: boolean } = {},
    db: Knex = this.database.knex
  ): Promise<Notification[]> {
    let query = db('approval_notifications').where({ recipient });
    if (options.unreadOnly) {
      query = query.where({ is_read: false });
    }
    const rows: ApprovalNotificationRow[] = await query.orderBy([
      { column: 'created_at', order: 'desc' },
      { column: 'id', order: 'desc' }
    ]);
    return rows.map(toNotification);
  }
}
