import type { NewNotification, Notification } from '../../../../application/domain/model/Notification'
import type { NotificationPreference } from '../../../../application/domain/model/NotificationPreference'
import type {
    NotificationInsertRecord,
    NotificationPreferenceRecord,
    NotificationRecord,
} from '../entities/NotificationRecord'

/**
 * 永続化層とドメイン層の間で通知を変換するマッパー
 */

export function toDomain(record: NotificationRecord): Notification {
    return {
        id: record.id,
        category: record.category,
        reason: record.reason,
        reasonMessage: record.reason_message,
        status: record.status,
        recipient: record.recipient,
        source: record.source,
        payload: record.payload,
        createdOn: new Date(record.created_on),
        modifiedOn: new Date(record.modified_on),
    }
}

export function toInsertRecord(notification: NewNotification): NotificationInsertRecord {
    return {
        category: notification.category,
        reason: notification.reason,
        reason_message: notification.reasonMessage,
        status: notification.status,
        recipient: notification.recipient,
        source: notification.source,
        payload: notification.payload,
    }
}

export function preferenceToDomain(record: NotificationPreferenceRecord): NotificationPreference {
    return {
        userId: record.user_id,
        type: record.type,
        enabled: record.enabled,
    }
}
