import { inject, injectable } from 'tsyringe'
import type { DomainEvent } from '../../../common/event/DomainEvent'
import { AccountSignupEvent } from '../../../common/event/events/AccountSignupEvent'
import { ACCOUNT_APPROVAL_REQUEST } from '../domain/model/NotificationReasons'
import type { SendNotificationUseCase } from '../port/in/SendNotificationUseCase'
import { SendNotificationUseCaseToken } from '../port/in/SendNotificationUseCase'
import type { NotificationProducer } from './NotificationProducer'

export const ACCOUNT_APPROVER_ROLE = 'approver'

/**
 * 新規アカウントの承認依頼を承認者ロールに通知する
 */
@injectable()
export class NewAccountNotificationProducer implements NotificationProducer {
    readonly eventTypes = [AccountSignupEvent.TYPE]

    constructor(
        @inject(SendNotificationUseCaseToken)
        private readonly notificationService: SendNotificationUseCase
    ) {}

    async processEvent(event: DomainEvent): Promise<void> {
        if (!(event instanceof AccountSignupEvent)) {
            console.debug(`NewAccountNotificationProducer not interested in ${event.eventType}`)
            return
        }

        if (!event.approvalRequired) {
            return
        }

        await this.notificationService.sendNotification({
            recipient: [{ recipient: ACCOUNT_APPROVER_ROLE, recipientType: 'ROLE' }],
            reason: ACCOUNT_APPROVAL_REQUEST,
            reasonMessage: `A new account needs approval to gain access ${event.username}`,
            category: 'USER_ADMINISTRATION',
            source: event.headers.source,
            payload: event,
        })
    }
}
