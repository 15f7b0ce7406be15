import { inject, injectable } from 'tsyringe'
import type { DomainEvent } from '../../../common/event/DomainEvent'
import { ApiSignupEvent } from '../../../common/event/events/ApiSignupEvent'
import { API_APPROVAL_REQUEST } from '../domain/model/NotificationReasons'
import type { SendNotificationUseCase } from '../port/in/SendNotificationUseCase'
import { SendNotificationUseCaseToken } from '../port/in/SendNotificationUseCase'
import type { NotificationProducer } from './NotificationProducer'

export const API_APPROVER_ROLE = 'api-approver'

/**
 * 承認が必要な API 利用申請を API 承認者ロールに通知する
 */
@injectable()
export class ApiSignupNotificationProducer implements NotificationProducer {
    readonly eventTypes = [ApiSignupEvent.TYPE]

    constructor(
        @inject(SendNotificationUseCaseToken)
        private readonly notificationService: SendNotificationUseCase
    ) {}

    async processEvent(event: DomainEvent): Promise<void> {
        if (!(event instanceof ApiSignupEvent)) {
            console.debug(`ApiSignupNotificationProducer not interested in ${event.eventType}`)
            return
        }

        if (!event.approvalRequired) {
            return
        }

        await this.notificationService.sendNotification({
            recipient: [{ recipient: API_APPROVER_ROLE, recipientType: 'ROLE' }],
            reason: API_APPROVAL_REQUEST,
            reasonMessage:
                `${event.requestedBy} requested access to ${event.organizationId}/${event.apiId} ` +
                `${event.apiVersion} (plan ${event.planId})`,
            category: 'API_ADMINISTRATION',
            source: 'devportal',
            payload: event,
        })
    }
}
