import { inject, injectable } from 'tsyringe'
import type { NotificationDto } from '../../../../application/domain/model/Notification'
import { API_APPROVAL_REQUEST } from '../../../../application/domain/model/NotificationReasons'
import type { EmailMessage, EmailSenderPort } from '../../../../application/port/out/EmailSenderPort'
import { EmailSenderPortToken } from '../../../../application/port/out/EmailSenderPort'
import { NotificationService } from '../../../../application/service/NotificationService'
import { apiSignupApprovalEmail } from '../templates/ApiSignupApprovalTemplate'
import { EmailNotificationHandler } from './EmailNotificationHandler'

@injectable()
export class ApiSignupApprovalHandler extends EmailNotificationHandler {
    protected readonly reason = API_APPROVAL_REQUEST

    constructor(
        @inject(EmailSenderPortToken) emailSender: EmailSenderPort,
        @inject(NotificationService) notificationService: NotificationService
    ) {
        super(emailSender, notificationService)
    }

    protected compose(notification: NotificationDto, to: string): EmailMessage {
        return apiSignupApprovalEmail(notification, to)
    }
}
