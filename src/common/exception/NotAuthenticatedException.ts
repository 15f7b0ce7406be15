import { ApplicationException } from './ApplicationException'

/**
 * ログインが必要な操作を匿名で呼び出した場合の例外（HTTP 401）
 */
export class NotAuthenticatedException extends ApplicationException {
    constructor(message = 'Authentication required') {
        super(message)
        this.name = 'NotAuthenticatedException'
    }
}
