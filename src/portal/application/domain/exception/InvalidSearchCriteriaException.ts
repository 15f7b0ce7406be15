import { ApplicationException } from '../../../../common/exception/ApplicationException'

export class InvalidSearchCriteriaException extends ApplicationException {
    constructor(message: string) {
        super(message)
        this.name = 'InvalidSearchCriteriaException'
    }
}
