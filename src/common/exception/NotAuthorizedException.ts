import { ApplicationException } from './ApplicationException'

/**
 * 操作する権限がない場合の例外（HTTP 403）
 */
export class NotAuthorizedException extends ApplicationException {
    constructor(message = 'Not authorized to perform this action') {
        super(message)
        this.name = 'NotAuthorizedException'
    }
}
