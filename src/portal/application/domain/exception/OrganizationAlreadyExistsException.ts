import { ApplicationException } from '../../../../common/exception/ApplicationException'

/**
 * 同じ ID の組織が既に存在する場合の例外
 */
export class OrganizationAlreadyExistsException extends ApplicationException {
    constructor(public readonly organizationId: string) {
        super(`Organization already exists: ${organizationId}`)
        this.name = 'OrganizationAlreadyExistsException'
    }
}
