import { ApplicationException } from '../../../../common/exception/ApplicationException'
import type { NotificationStatus } from '../model/Notification'

/**
 * 既読化に OPEN を指定した場合の例外
 */
export class InvalidNotificationStatusException extends ApplicationException {
    constructor(public readonly status: NotificationStatus) {
        super(`When marking a notification as read a non-OPEN status must be provided: ${status}`)
        this.name = 'InvalidNotificationStatusException'
    }
}
