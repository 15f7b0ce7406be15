import { inject, injectable } from 'tsyringe'
import type { NotificationDto } from '../../../../application/domain/model/Notification'
import { ACCOUNT_APPROVAL_REQUEST } from '../../../../application/domain/model/NotificationReasons'
import type { EmailMessage, EmailSenderPort } from '../../../../application/port/out/EmailSenderPort'
import { EmailSenderPortToken } from '../../../../application/port/out/EmailSenderPort'
import { NotificationService } from '../../../../application/service/NotificationService'
import { accountApprovalEmail } from '../templates/AccountApprovalTemplate'
import { EmailNotificationHandler } from './EmailNotificationHandler'

@injectable()
export class AccountApprovalHandler extends EmailNotificationHandler {
    protected readonly reason = ACCOUNT_APPROVAL_REQUEST

    constructor(
        @inject(EmailSenderPortToken) emailSender: EmailSenderPort,
        @inject(NotificationService) notificationService: NotificationService
    ) {
        super(emailSender, notificationService)
    }

    protected compose(notification: NotificationDto, to: string): EmailMessage {
        return accountApprovalEmail(notification, to)
    }
}
