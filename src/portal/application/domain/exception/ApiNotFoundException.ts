import { ApplicationException } from '../../../../common/exception/ApplicationException'

/**
 * API が存在しない場合の例外
 */
export class ApiNotFoundException extends ApplicationException {
    constructor(
        public readonly organizationId: string,
        public readonly apiId: string
    ) {
        super(`API not found: ${organizationId}/${apiId}`)
        this.name = 'ApiNotFoundException'
    }
}
